import type { Readable } from "stream";

type ReadState = {
  pending: Buffer[];
  ended: boolean;
  failure: Error | null;
  wake: (() => void) | null;
};

/**
 * Yield a socket's reads one at a time, as they arrived.
 *
 * A paused Readable hands buffered data back joined into one chunk, which
 * would merge frames. Flowing mode emits each read separately, so the
 * socket runs flowing and is paused after every chunk until the consumer
 * asks for the next one.
 *
 * Ends on `end` or `close`; throws the socket's error.
 */
export async function* readChunks(
  socket: Readable
): AsyncGenerator<Buffer, void, undefined> {
  const state: ReadState = {
    pending: [],
    ended: socket.readableEnded || socket.destroyed,
    failure: socket.errored,
    wake: null,
  };

  const notify = () => {
    const wake = state.wake;
    state.wake = null;
    wake?.();
  };
  const onData = (chunk: Buffer) => {
    state.pending.push(chunk);
    socket.pause();
    notify();
  };
  const onEnd = () => {
    state.ended = true;
    notify();
  };
  const onError = (err: Error) => {
    state.failure = err;
    notify();
  };

  socket.on("data", onData);
  socket.on("end", onEnd);
  socket.on("close", onEnd);
  socket.on("error", onError);

  try {
    while (true) {
      const chunk = state.pending.shift();
      if (chunk) {
        yield chunk;
        continue;
      }
      if (state.failure) throw state.failure;
      if (state.ended) return;

      await new Promise<void>((resolve) => {
        state.wake = resolve;
        socket.resume();
      });
    }
  } finally {
    socket.off("data", onData);
    socket.off("end", onEnd);
    socket.off("close", onEnd);
    socket.off("error", onError);
  }
}
