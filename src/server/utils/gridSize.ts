import { MIN_GRID_SIZE } from '../../shared/constants';
import { createInvalidConfigurationError } from '../../shared/errors';
import { createLogger } from '../../shared/logger';

const logger = createLogger('GridSize');

export interface GridSizeLimits {
  defaultGridSize: number;
  maxGridSize: number;
}

/**
 * Turn a requested size into one the transport accepts: missing means the
 * default, too large is clamped to the maximum, anything else invalid throws.
 */
export function resolveGridSize(raw: unknown, limits: GridSizeLimits): number {
  if (raw === undefined || raw === null) {
    return limits.defaultGridSize;
  }
  if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < MIN_GRID_SIZE) {
    throw createInvalidConfigurationError(raw, MIN_GRID_SIZE);
  }
  if (raw > limits.maxGridSize) {
    logger.debug('Clamping grid size', { requested: raw, max: limits.maxGridSize });
    return limits.maxGridSize;
  }
  return raw;
}
