import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { confirmByTyping, prompt } from '../lib/prompt.js';

function streams(): { input: PassThrough; output: PassThrough } {
  return { input: new PassThrough(), output: new PassThrough() };
}

describe('prompt', () => {
  it('should resolve with the trimmed answer', async () => {
    const io = streams();

    const answer = prompt('Name: ', io);
    io.input.write('  rg-test  \n');

    expect(await answer).toBe('rg-test');
  });
});

describe('confirmByTyping', () => {
  it('should confirm on an exact match', async () => {
    const io = streams();

    const confirmed = confirmByTyping('rg-test', io);
    io.input.write('rg-test\n');

    expect(await confirmed).toBe(true);
  });

  it('should refuse anything else', async () => {
    const io = streams();

    const confirmed = confirmByTyping('rg-test', io);
    io.input.write('y\n');

    expect(await confirmed).toBe(false);
  });
});
