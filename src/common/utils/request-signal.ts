/**
 * The part of an HTTP response the signal watches
 */
export interface ResponseLike {
  readonly writableFinished: boolean;
  on(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

export interface RequestSignal {
  signal: AbortSignal;
  /** Stop watching the response and clear the timeout */
  dispose(): void;
}

export class ClientDisconnectedError extends Error {
  constructor() {
    super('Client disconnected before the response was sent');
    this.name = 'ClientDisconnectedError';
    Object.setPrototypeOf(this, ClientDisconnectedError.prototype);
  }
}

export class RequestTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    Object.setPrototypeOf(this, RequestTimeoutError.prototype);
  }
}

/**
 * Abort signal of one request: aborted when the client goes away before the
 * response is finished, or when `timeoutMs` elapses
 */
export function createRequestSignal(
  res: ResponseLike,
  timeoutMs: number,
): RequestSignal {
  const controller = new AbortController();

  const onClose = (): void => {
    if (!res.writableFinished) {
      controller.abort(new ClientDisconnectedError());
    }
  };
  res.on('close', onClose);

  const timer = setTimeout(() => {
    controller.abort(new RequestTimeoutError(timeoutMs));
  }, timeoutMs);
  timer.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      res.off('close', onClose);
    },
  };
}
