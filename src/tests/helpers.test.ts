import { describe, it, expect } from 'vitest';
import fs from 'fs';
import { tempRoot } from './helpers.js';

describe('tempRoot', () => {
  let previous = '';

  it('creates a fresh directory', () => {
    previous = tempRoot();
    expect(fs.statSync(previous).isDirectory()).toBe(true);
  });

  it('removes directories from earlier tests', () => {
    expect(previous).not.toBe('');
    expect(fs.existsSync(previous)).toBe(false);
  });
});
