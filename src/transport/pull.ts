import { TransportError } from '../errors.js';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';
import type { PullTransport, Transport } from './types.js';

const log = createLogger('Transport');

export interface PullBridgeOptions {
  /** How long each `receive()` call may wait before the loop checks for shutdown. */
  pollMs?: number;
}

/**
 * Adapt a pull transport to the push interface the session consumes.
 *
 * A receive loop runs while someone is subscribed and forwards each
 * notification to the subscriber. A failing `receive()` disconnects with a
 * `TransportError` carrying the cause.
 */
export function fromPullTransport(pull: PullTransport, opts: PullBridgeOptions = {}): Transport {
  const pollMs = opts.pollMs ?? 100;
  const disconnectCallbacks: ((error?: Error) => void)[] = [];
  let onData: ((data: Uint8Array) => void) | null = null;
  let running = false;
  let closed = false;

  const notifyDisconnect = (error?: Error): void => {
    for (const cb of disconnectCallbacks.splice(0)) cb(error);
  };

  const loop = async (): Promise<void> => {
    while (running) {
      let data: Uint8Array | null;
      try {
        data = await pull.receive(pollMs);
      } catch (err) {
        running = false;
        if (!closed) {
          const error = new TransportError(`Receive failed: ${errMsg(err)}`);
          log.error(error.message);
          notifyDisconnect(error);
        }
        return;
      }
      if (data && running && onData) onData(data);
    }
  };

  return {
    write: (data) => pull.send(data),
    subscribe: async (handler) => {
      onData = handler;
      if (!running) {
        running = true;
        void loop();
      }
      return () => {
        onData = null;
        running = false;
      };
    },
    onDisconnect: (callback) => {
      disconnectCallbacks.push(callback);
    },
    close: async () => {
      closed = true;
      running = false;
      onData = null;
      await pull.close();
    },
  };
}
