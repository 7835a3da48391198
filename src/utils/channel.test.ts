import { describe, expect, it } from 'vitest';
import { Channel } from './channel';

describe('Channel', () => {
  it('delivers buffered items in order and ends after close', async () => {
    const channel = new Channel<number>();
    await channel.push(1);
    await channel.push(2);
    channel.close();

    const seen: number[] = [];
    for await (const item of channel) seen.push(item);
    expect(seen).toEqual([1, 2]);
  });

  it('wakes a waiting consumer', async () => {
    const channel = new Channel<string>();
    const pending = channel.next();
    await channel.push('a');
    await expect(pending).resolves.toEqual({ value: 'a', done: false });

    const finished = channel.next();
    channel.close();
    await expect(finished).resolves.toEqual({ value: undefined, done: true });
  });

  it('refuses pushes after close', async () => {
    const channel = new Channel<number>();
    channel.close();
    await expect(channel.push(1)).rejects.toThrow('Cannot push to a closed channel');
  });

  it('holds a producer back once the buffer is full', async () => {
    const channel = new Channel<number>(2);
    await channel.push(1);

    let released = false;
    const second = channel.push(2).then(() => {
      released = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(released).toBe(false);

    await expect(channel.next()).resolves.toEqual({ value: 1, done: false });
    await second;
    expect(released).toBe(true);
  });

  it('releases blocked producers on close', async () => {
    const channel = new Channel<number>(1);
    const blocked = channel.push(1);
    channel.close();

    await expect(blocked).resolves.toBeUndefined();
    expect(channel.closed).toBe(true);
  });
});
