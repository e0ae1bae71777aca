import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';

export type MockChild = EventEmitter & { stdout: Readable };

/**
 * A stand-in for the process `spawn` returns. Each chunk is emitted as a
 * separate `data` event, then `close` fires with `exitCode`.
 */
export function createMockChild(chunks: string[], exitCode: number | null = 0): MockChild {
  const child = Object.assign(new EventEmitter(), { stdout: Readable.from(chunks) });
  child.stdout.on('end', () => {
    setTimeout(() => child.emit('close', exitCode), 0);
  });
  return child;
}

/** A child whose spawn fails, the way a missing binary reports ENOENT. */
export function createFailingChild(error: Error): MockChild {
  const child = Object.assign(new EventEmitter(), { stdout: Readable.from([]) });
  setTimeout(() => child.emit('error', error), 0);
  return child;
}

export function streamLines(...messages: object[]): string {
  return messages.map((m) => JSON.stringify(m)).join('\n') + '\n';
}
