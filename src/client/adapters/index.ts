/**
 * Game Adapters
 *
 * Abstracts local (in-process) and online (colyseus) play so a front end
 * can work identically in both modes.
 */

export * from './GameAdapter';
export { LocalGameAdapter } from './LocalGameAdapter';
export { OnlineRoomAdapter, type RoomConnection } from './OnlineRoomAdapter';
