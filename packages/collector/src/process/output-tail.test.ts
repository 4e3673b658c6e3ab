import { describe, it, expect } from 'vitest';
import { OutputTail } from './output-tail.js';

describe('OutputTail', () => {
  it('keeps everything while under the limit', () => {
    const tail = new OutputTail(100);
    tail.push('first');
    tail.push('second');

    expect(tail.toString()).toBe('first\nsecond');
  });

  it('drops the oldest lines past the limit', () => {
    const tail = new OutputTail(12);
    tail.push('aaaa');
    tail.push('bbbb');
    tail.push('cccc');

    expect(tail.toString()).toBe('...\nbbbb\ncccc');
  });
});
