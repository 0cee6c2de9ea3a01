import { describe, it, expect } from 'vitest';
import { createMailbox } from '../mailbox';
import { withTimeout } from '../actorMessages';

describe('Mailbox', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => createMailbox<number>(0)).toThrow(
      'Mailbox capacity must be a positive integer: 0'
    );
  });

  it('delivers in arrival order', async () => {
    const mailbox = createMailbox<number>(4);
    await mailbox.send(1);
    await mailbox.send(2);
    await mailbox.send(3);
    expect(await mailbox.receive()).toBe(1);
    expect(await mailbox.receive()).toBe(2);
    expect(await mailbox.receive()).toBe(3);
  });

  it('hands an item straight to a waiting receiver', async () => {
    const mailbox = createMailbox<number>(1);
    const pending = mailbox.receive();
    expect(await mailbox.send(5)).toBe(true);
    expect(await pending).toBe(5);
    expect(mailbox.size()).toBe(0);
  });

  it('applies backpressure when full', async () => {
    const mailbox = createMailbox<number>(1);
    expect(await mailbox.send(1)).toBe(true);

    const blocked = mailbox.send(2);
    expect(mailbox.size()).toBe(1);
    expect(await mailbox.receive()).toBe(1);
    expect(await blocked).toBe(true);
    expect(mailbox.size()).toBe(1);
    expect(await mailbox.receive()).toBe(2);
  });

  it('returns undelivered items on close, blocked senders included', async () => {
    const mailbox = createMailbox<string>(2);
    await mailbox.send('a');
    await mailbox.send('b');
    const blocked = mailbox.send('c');

    expect(mailbox.close()).toEqual(['a', 'b', 'c']);
    expect(await blocked).toBe(true);
    expect(mailbox.isClosed()).toBe(true);
    expect(await mailbox.send('d')).toBe(false);
    expect(await mailbox.receive()).toBeUndefined();
    expect(mailbox.close()).toEqual([]);
  });

  it('wakes waiting receivers with undefined on close', async () => {
    const mailbox = createMailbox<number>(1);
    const pending = mailbox.receive();
    mailbox.close();
    expect(await pending).toBeUndefined();
  });
});

describe('withTimeout', () => {
  it('resolves with the reply when it arrives in time', async () => {
    expect(await withTimeout(Promise.resolve('pong'), 50)).toBe('pong');
  });

  it('resolves undefined when nothing answers', async () => {
    const never = new Promise<string>(() => {});
    expect(await withTimeout(never, 10)).toBeUndefined();
  });
});
