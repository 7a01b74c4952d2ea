import { RenderError } from '@pkgview/core';

function isBrokenPipe(error: Error): boolean {
  return 'code' in error && error.code === 'EPIPE';
}

/**
 * Write rendered output in one call. A reader that closed the pipe early (`| head`) is not an
 * error; any other stream failure rejects with a RenderError.
 */
export function writeOutput(
  text: string,
  stream: NodeJS.WritableStream = process.stdout
): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const settle = (error?: Error | null): void => {
      if (settled) return;
      settled = true;
      if (!error || isBrokenPipe(error)) {
        resolve();
      } else {
        reject(RenderError.ioFailure(error));
      }
    };
    // Left attached after a failed write: the stream emits 'error' once more after the callback.
    stream.once('error', settle);
    stream.write(text, (error) => {
      if (!error) stream.removeListener('error', settle);
      settle(error);
    });
  });
}
