/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  enabled(lvl: Verbosity): boolean;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
): Logger {
  return {
    level,
    enabled(lvl) {
      return lvl <= level;
    },
    log(lvl, msg) {
      if (lvl <= level) sink(`${lvl}| ${msg}`);
    },
  };
}

/** Clamp a repeat count (e.g. `-vvv`) into the supported range. */
export function toVerbosity(n: number): Verbosity {
  if (n <= 0) return 0;
  if (n === 1) return 1;
  if (n === 2) return 2;
  if (n === 3) return 3;
  return 4;
}
