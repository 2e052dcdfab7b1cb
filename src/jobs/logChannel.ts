// Unbounded FIFO carrying raw ffmpeg output from the supervisor to whoever polls the job.
export type LogSender<T> = (item: T) => boolean;

export type LogChannel<T> = {
  // Queues an item; returns false once the channel is closed.
  send: LogSender<T>;
  // Takes everything queued so far without waiting.
  drain: () => T[];
  // Takes the oldest item, if any.
  tryReceive: () => T | undefined;
  close: () => void;
  isClosed: () => boolean;
  size: () => number;
};

export const createLogChannel = <T = string>(): LogChannel<T> => {
  let queue: T[] = [];
  let closed = false;

  return {
    send: (item) => {
      if (closed) {
        return false;
      }
      queue.push(item);
      return true;
    },
    drain: () => {
      if (queue.length === 0) {
        return [];
      }
      const items = queue;
      queue = [];
      return items;
    },
    tryReceive: () => queue.shift(),
    // Items queued before close stay drainable.
    close: () => {
      closed = true;
    },
    isClosed: () => closed,
    size: () => queue.length
  };
};
