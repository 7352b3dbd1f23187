import 'dotenv/config';
import { Server } from 'colyseus';
import { createServer } from 'http';
import { readFileSync } from 'fs';
import { join } from 'path';
import { SessionRegistry } from '../shared/core/SessionRegistry';
import { createLogger } from '../shared/logger';
import { createApp } from './app';
import { loadConfig } from './config';
import { Leaderboard } from './leaderboard/Leaderboard';
import { RequestMetrics } from './metrics/RequestMetrics';
import { bindGridRoom } from './rooms/GridRoom';

const logger = createLogger('Server');

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      const { version } = packageJson;
      if (typeof version === 'string') return version;
    }
  } catch (error) {
    logger.warn('Could not read package.json for version', error);
  }
  return '0.0.0';
}

const config = loadConfig();
const version = readVersion();
logger.info('ALLOWED_ORIGINS', config.allowedOrigins);

const sessions = new SessionRegistry({ name: 'sessions' });
const rooms = new SessionRegistry({ name: 'rooms' });

const app = createApp({
  config,
  sessions,
  rooms,
  leaderboard: new Leaderboard(config.leaderboardLimit),
  metrics: new RequestMetrics(),
  version,
});

const server = createServer(app);
const gameServer = new Server({ server });

gameServer
  .define('grid_room', bindGridRoom(rooms, config))
  .filterBy(['roomKey']);

gameServer
  .listen(config.port)
  .then(() => {
    logger.info(`Tile merge server v${version} listening on port ${config.port}`);
  })
  .catch((error: unknown) => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });
