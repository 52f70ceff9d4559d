/**
 * Logger utility using pino.
 * One root logger, one named child per module. --verbose switches every
 * logger, including ones created before the flag was parsed, to trace.
 */
import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';

let globalLevel: string = process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info');
let root: pino.Logger | null = null;
const children: pino.Logger[] = [];

function rootLogger(): pino.Logger {
  if (root) return root;
  root = pino({
    level: globalLevel,
    // The pretty transport runs in a worker thread; tests log nothing anyway.
    transport: isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
  });
  return root;
}

export function setLogLevel(level: string): void {
  globalLevel = level;
  if (root) root.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export function createLogger(name: string): pino.Logger {
  const child = rootLogger().child({ name });
  child.level = globalLevel;
  children.push(child);
  return child;
}

export function enableVerbose(): void {
  setLogLevel('trace');
}
