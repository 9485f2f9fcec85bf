import { EventEmitter } from 'events';
import {
  ClientDisconnectedError,
  RequestTimeoutError,
  createRequestSignal,
} from './request-signal';

class FakeResponse extends EventEmitter {
  writableFinished = false;
}

describe('createRequestSignal', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('aborts when the client goes away before the response finished', () => {
    const res = new FakeResponse();
    const request = createRequestSignal(res, 30000);

    res.emit('close');

    expect(request.signal.aborted).toBe(true);
    expect(request.signal.reason).toBeInstanceOf(ClientDisconnectedError);
    request.dispose();
  });

  it('ignores close once the response is finished', () => {
    const res = new FakeResponse();
    const request = createRequestSignal(res, 30000);

    res.writableFinished = true;
    res.emit('close');

    expect(request.signal.aborted).toBe(false);
    request.dispose();
  });

  it('aborts on timeout', () => {
    jest.useFakeTimers();
    const request = createRequestSignal(new FakeResponse(), 1000);

    jest.advanceTimersByTime(999);
    expect(request.signal.aborted).toBe(false);

    jest.advanceTimersByTime(1);
    expect(request.signal.aborted).toBe(true);
    expect(request.signal.reason).toEqual(new RequestTimeoutError(1000));
  });

  it('stops watching after dispose', () => {
    jest.useFakeTimers();
    const res = new FakeResponse();
    const request = createRequestSignal(res, 1000);

    request.dispose();
    res.emit('close');
    jest.advanceTimersByTime(5000);

    expect(request.signal.aborted).toBe(false);
    expect(res.listenerCount('close')).toBe(0);
  });
});
