import { describe, it, expect, vi } from 'vitest';
import { createSubject } from '../src/observer';

describe('createSubject', () => {
  it('notifies all subscribers in subscription order', () => {
    const subject = createSubject<string>();
    const calls: string[] = [];

    subject.subscribe((event) => calls.push(`first:${event}`));
    subject.subscribe((event) => calls.push(`second:${event}`));

    subject.notify('tick');

    expect(calls).toEqual(['first:tick', 'second:tick']);
  });

  it('delivers synchronously', () => {
    const subject = createSubject<number>();
    const observer = vi.fn();
    subject.subscribe(observer);

    subject.notify(1);

    expect(observer).toHaveBeenCalledWith(1);
  });

  it('allows unsubscription', () => {
    const subject = createSubject<string>();
    const observer = vi.fn();

    const unsub = subject.subscribe(observer);
    subject.notify('first');

    unsub();
    subject.notify('second');

    expect(observer).toHaveBeenCalledTimes(1);
    expect(observer).toHaveBeenCalledWith('first');
  });

  it('catches observer errors and reports via onError', () => {
    const onError = vi.fn();
    const subject = createSubject<string>({ onError });
    const error = new Error('test error');
    const goodObserver = vi.fn();

    subject.subscribe(() => {
      throw error;
    });
    subject.subscribe(goodObserver);

    subject.notify('test');

    expect(onError).toHaveBeenCalledWith(error, 'test');
    expect(goodObserver).toHaveBeenCalledWith('test');
  });

  it('only shows observers added during delivery the next event', () => {
    const subject = createSubject<number>();
    const late = vi.fn();

    subject.subscribe(() => {
      subject.subscribe(late);
    });

    subject.notify(1);
    expect(late).not.toHaveBeenCalled();

    subject.notify(2);
    expect(late).toHaveBeenCalledWith(2);
  });

  it('tracks subscriber count and clears', () => {
    const subject = createSubject<string>();

    const unsub = subject.subscribe(() => {});
    subject.subscribe(() => {});
    expect(subject.size()).toBe(2);

    unsub();
    expect(subject.size()).toBe(1);

    subject.clear();
    expect(subject.size()).toBe(0);
  });
});
