import { Schema, type } from '@colyseus/schema';

export class PlayerSchema extends Schema {
  @type('string') sessionId: string = '';
  @type('string') nickname: string = '';
  @type('number') joinedAt: number = Date.now();
}
