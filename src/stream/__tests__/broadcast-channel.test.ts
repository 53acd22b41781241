import * as logging from '../../logging';
import { probe } from '../../test/helpers';
import { BroadcastChannel } from '../broadcast-channel';

describe('BroadcastChannel', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should deliver every value to every current listener', () => {
    const channel = new BroadcastChannel<number>('numbers');
    const first = probe(channel.stream);
    const second = probe(channel.stream);

    channel.add(1);
    channel.add(2);

    expect(first.values).toEqual([1, 2]);
    expect(second.values).toEqual([1, 2]);
    expect(channel.listenerCount).toBe(2);
  });

  it('should not replay values to late listeners', () => {
    const channel = new BroadcastChannel<number>('numbers');
    channel.add(1);

    const late = probe(channel.stream);
    channel.add(2);

    expect(late.values).toEqual([2]);
  });

  it('should stop delivering after unsubscribe', () => {
    const channel = new BroadcastChannel<number>('numbers');
    const listener = probe(channel.stream);

    channel.add(1);
    listener.subscription.unsubscribe();
    channel.add(2);

    expect(listener.values).toEqual([1]);
    expect(listener.subscription.closed).toBe(true);
    expect(channel.listenerCount).toBe(0);
  });

  it('should deliver errors without closing the channel', () => {
    const channel = new BroadcastChannel<number>('numbers');
    const listener = probe(channel.stream);
    const failure = new Error('boom');

    channel.addError(failure);
    channel.add(3);

    expect(listener.errors).toEqual([failure]);
    expect(listener.values).toEqual([3]);
    expect(listener.completed).toBe(false);
  });

  it('should complete listeners on close and ignore later emissions', () => {
    const channel = new BroadcastChannel<number>('numbers');
    const listener = probe(channel.stream);

    channel.close();

    expect(listener.completed).toBe(true);
    expect(channel.closed).toBe(true);
    expect(channel.add(1)).toBe(false);
    expect(channel.addError(new Error('late'))).toBe(false);
    expect(listener.values).toEqual([]);
    expect(listener.errors).toEqual([]);
  });

  it('should complete a listener that subscribes after close right away', () => {
    const channel = new BroadcastChannel<number>('numbers');
    channel.close();

    const listener = probe(channel.stream);

    expect(listener.completed).toBe(true);
    expect(listener.subscription.closed).toBe(true);
    expect(channel.listenerCount).toBe(0);
  });

  it('should keep delivering when one listener throws', () => {
    const errorSpy = jest.spyOn(logging, 'error').mockImplementation(() => undefined);
    const channel = new BroadcastChannel<number>('numbers');
    channel.stream.subscribe(() => {
      throw new Error('listener failed');
    });
    const healthy = probe(channel.stream);

    channel.add(1);

    expect(healthy.values).toEqual([1]);
    expect(errorSpy).toHaveBeenCalledWith("Listener on 'numbers' threw: listener failed");
  });

  it('should tolerate listeners that unsubscribe while a value is delivered', () => {
    const channel = new BroadcastChannel<number>('numbers');
    const received: number[] = [];
    const subscription = channel.stream.subscribe((value) => {
      received.push(value);
      subscription.unsubscribe();
    });
    const other = probe(channel.stream);

    channel.add(1);
    channel.add(2);

    expect(received).toEqual([1]);
    expect(other.values).toEqual([1, 2]);
  });
});
