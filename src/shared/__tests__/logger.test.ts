import { logger } from '../logger';

describe('logger', () => {
  it('should leave uncaught exceptions to the CLI entry point', () => {
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0].handleExceptions).toBeFalsy();
  });

  it('should be silent under test', () => {
    expect(logger.silent).toBe(true);
  });
});
