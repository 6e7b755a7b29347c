import { createLogger, toVerbosity } from '../src/util/logger.js';

describe('tiny logger', () => {
  it('obeys verbosity levels', () => {
    const sink: string[] = [];
    const log = createLogger(2, m => sink.push(m));

    log.log(3, 'low-prio');   // should be ignored
    log.log(1, 'important');
    expect(sink).toEqual(['1| important']);
  });

  it('reports whether a level is enabled', () => {
    const log = createLogger(1, () => {});
    expect(log.enabled(1)).toBe(true);
    expect(log.enabled(2)).toBe(false);
  });

  it('clamps repeat counts', () => {
    expect([-1, 0, 1, 2, 3, 4, 9].map(toVerbosity)).toEqual([0, 0, 1, 2, 3, 4, 4]);
  });
});
