import fs from 'fs';

/**
 * Something that has a debug str
 */
export interface IHaveDebugStr {
  toDebugStr(): string;
}

type Listener = (...args: unknown[]) => void;

const ALL_SCOPES = ['1', 'true', '*'];

/**
 * Whether console output is turned on for the given scope.
 *
 * DEBUG is a comma separated list of scopes (`DEBUG=determinize,minimize`),
 * or one of `1`, `true` and `*` for all of them. Unscoped lines are printed
 * whenever DEBUG is set.
 */
function consoleEnabled(scope: string | undefined): boolean {
  const setting = process.env.DEBUG;
  if (!setting) {
    return false;
  }
  const scopes = setting.split(',').map((s) => s.trim());
  if (scope === undefined || scopes.some((s) => ALL_SCOPES.includes(s))) {
    return true;
  }
  return scopes.includes(scope);
}

class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(...args: unknown[]) {
    this.write(undefined, args);
  }

  /**
   * A log function whose lines start with `scope:`.
   */
  scoped(scope: string) {
    return (...args: unknown[]) => this.write(scope, [`${scope}:`, ...args]);
  }

  private write(scope: string | undefined, args: unknown[]) {
    for (const listener of this.listeners) {
      listener(...args);
    }
    if (consoleEnabled(scope)) {
      console.log(...args);
    } else if (process.env.DEBUG_FILE) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(process.env.DEBUG_FILE, 'w');
      }
      fs.writeSync(this.debugFile, args.join(' ') + '\n');
    }
  }

  /**
   * Run the given function, collecting every line logged while it runs.
   */
  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args) => logs.push(args.join(' ')));
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

export function log(...args: unknown[]) {
  logger.log(...args);
}

export function scopedLog(scope: string) {
  return logger.scoped(scope);
}

let shouldUseColors = false;
export function useColors(enabled: boolean = true) {
  shouldUseColors = enabled;
}

const ColorCodes = {
  red: '\u001b[31m',
  green: '\u001b[32m',
  reset: '\u001b[0m',
  bold: '\u001b[1m',
};
type Color = Exclude<keyof typeof ColorCodes, 'reset'>;

function paint(color: Color) {
  return (s: string): string =>
    shouldUseColors ? ColorCodes[color] + s + ColorCodes.reset : s;
}

export const colors = {
  red: paint('red'),
  green: paint('green'),
  bold: paint('bold'),
};
