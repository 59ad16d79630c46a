import { describe, expect, it } from 'vitest';
import { sanitizeForFilename } from './filename-sanitizer.js';

describe('sanitizeForFilename', () => {
  it('should strip reserved characters and join words with underscores', () => {
    expect(sanitizeForFilename('File <with> : illegal "chars"')).toBe('File_with_illegal_chars');
  });

  it('should remove control characters', () => {
    expect(sanitizeForFilename('File\x00Name\x1F')).toBe('FileName');
  });

  it('should drop punctuation that is not a word character or hyphen', () => {
    expect(sanitizeForFilename('C++ / Rust: a comparison!')).toBe('C_Rust_a_comparison');
    expect(sanitizeForFilename('Q&A - part 2')).toBe('QA_-_part_2');
  });

  it('should keep letters from other scripts', () => {
    expect(sanitizeForFilename('Café Müller')).toBe('Café_Müller');
  });

  it('should collapse and trim repeated separators', () => {
    expect(sanitizeForFilename('  __hello__  world  ')).toBe('hello_world');
  });

  it('should truncate and strip a dangling separator', () => {
    expect(sanitizeForFilename('abc def ghi', 8)).toBe('abc_def');
  });

  it('should fall back to "untitled" when nothing is left', () => {
    expect(sanitizeForFilename('')).toBe('untitled');
    expect(sanitizeForFilename('???')).toBe('untitled');
  });

  it('should keep the fallback within maxLength', () => {
    expect(sanitizeForFilename('', 4)).toBe('unti');
  });

  it('should honour a custom replacement', () => {
    expect(sanitizeForFilename('one two  three', 50, '-')).toBe('one-two-three');
  });
});
