import { execFile } from 'child_process';
import { promisify } from 'util';

interface NodeError extends Error {
  code: string;
}

export function isNodeError(err: unknown): err is NodeError {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/** Reject with a TimeoutError if `promise` has not settled within `ms` */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export interface SerialQueue {
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Runs tasks one at a time in submission order. A failed task does not
 * stop the tasks queued behind it.
 */
export function createSerialQueue(): SerialQueue {
  let tail: Promise<unknown> = Promise.resolve();

  function run<T>(task: () => Promise<T>): Promise<T> {
    const result = tail.then(task, task);
    tail = result.catch(() => undefined);
    return result;
  }

  return { run };
}

export interface ExecOptions {
  timeout: number;
  maxBuffer?: number;
  windowsHide?: boolean;
  env?: NodeJS.ProcessEnv;
}

/** promisified execFile, narrowed to what the server passes; swapped for a fake in tests */
export type ExecFileAsync = (file: string, args: string[], options: ExecOptions) => Promise<{ stdout: string }>;

export const execFileAsync: ExecFileAsync = promisify(execFile);
