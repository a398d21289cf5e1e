/**
 * File handle lifetime
 */

import { createLogger } from '@blobpack/utils';

const log = createLogger({ module: 'container' });

export interface Closable {
  close(): Promise<void>;
}

/**
 * Run `body` with `handle`, then close it. When `body` fails, that failure
 * is what the caller sees; a close error on top of it is only logged.
 */
export async function withHandle<H extends Closable, T>(
  handle: H,
  path: string,
  body: (handle: H) => Promise<T>
): Promise<T> {
  let result: T;
  try {
    result = await body(handle);
  } catch (error) {
    try {
      await handle.close();
    } catch (closeError) {
      log.warn({ err: closeError, path }, 'Failed to close file after an earlier error');
    }
    throw error;
  }

  await handle.close();
  return result;
}
