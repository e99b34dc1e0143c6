import { describe, it, expect } from 'vitest';
import { config } from '../src/config.js';
import { createChildLogger, logger } from '../src/logger.js';

describe('logger', () => {
  it('should tag records with the configured name', () => {
    expect(logger.bindings()).toMatchObject({ name: config.log.name });
    expect(logger.level).toBe(config.log.level);
  });

  it('should bind the module name on child loggers', () => {
    expect(createChildLogger('driver').bindings()).toMatchObject({ module: 'driver' });
  });

  it('should keep extra bindings but never let them replace the module', () => {
    const child = createChildLogger('driver', { strategy: 'dp-multi', module: 'other' });
    expect(child.bindings()).toMatchObject({ module: 'driver', strategy: 'dp-multi' });
  });
});
