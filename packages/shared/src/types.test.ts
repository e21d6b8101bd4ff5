import { describe, it, expect } from 'vitest';
import { isClaimableStatus, formatErrorStatus, ERROR_MESSAGE_LIMIT } from './types.js';

describe('isClaimableStatus', () => {
  it('claims empty and Pending rows', () => {
    expect(isClaimableStatus('')).toBe(true);
    expect(isClaimableStatus('Pending')).toBe(true);
  });

  it('trims before comparing', () => {
    expect(isClaimableStatus('   ')).toBe(true);
    expect(isClaimableStatus('  Pending\n')).toBe(true);
  });

  it('skips every other status', () => {
    for (const status of ['Processing', 'Completed', 'Upload Failed', 'Error: boom', 'pending', 'Pending!']) {
      expect(isClaimableStatus(status)).toBe(false);
    }
  });
});

describe('formatErrorStatus', () => {
  it('prefixes short messages unchanged', () => {
    expect(formatErrorStatus(new Error('ffmpeg exited with code 1'))).toBe('Error: ffmpeg exited with code 1');
  });

  it('truncates the message to 50 characters', () => {
    const message = 'x'.repeat(80);
    const status = formatErrorStatus(new Error(message));
    expect(status).toBe(`Error: ${'x'.repeat(50)}`);
    expect(status.length - 'Error: '.length).toBe(ERROR_MESSAGE_LIMIT);
  });

  it('never cuts a character in half', () => {
    const message = `${'x'.repeat(49)}🎬 render failed`;
    const status = formatErrorStatus(new Error(message));
    expect(status).toBe(`Error: ${'x'.repeat(49)}🎬`);
    expect(/\p{Cs}/u.test(status)).toBe(false);
  });

  it('stringifies non-Error throwables', () => {
    expect(formatErrorStatus('quota gone')).toBe('Error: quota gone');
  });
});
