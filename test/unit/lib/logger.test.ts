import { createTimer } from '../../../src/lib/logger.js';
import { createMockLogger } from '../../__support__/utilities/mock-logger.js';

describe('createTimer', () => {
  it('logs the start and completion of an operation', () => {
    const logger = createMockLogger();
    const timer = createTimer(logger, 'load-compose', { path: '/work/compose.yaml' });

    const duration = timer.end({ services: 2 });

    expect(duration).toBeGreaterThanOrEqual(0);
    expect(logger.debug).toHaveBeenNthCalledWith(
      1,
      { operation: 'load-compose', path: '/work/compose.yaml' },
      'Starting load-compose',
    );
    expect(logger.debug).toHaveBeenNthCalledWith(
      2,
      { operation: 'load-compose', duration_ms: duration, path: '/work/compose.yaml', services: 2 },
      `Completed load-compose in ${duration}ms`,
    );
  });

  it('logs failures with the error message', () => {
    const logger = createMockLogger();
    const timer = createTimer(logger, 'load-compose');

    timer.error(new Error('permission denied'), { attempt: 1 });

    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'load-compose', error: 'permission denied', attempt: 1 }),
      expect.stringMatching(/^Failed load-compose after \d+ms$/),
    );
  });
});
