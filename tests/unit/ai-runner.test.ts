import { applyStopSequences, isAIPlatform } from '../../src/core/ai-runner.js';

describe('applyStopSequences', () => {
  it('should cut the text at the earliest stop sequence', () => {
    expect(applyStopSequences('{"a":1}<|endoftext|>Question 1: ###', ['###', '<|endoftext|>'])).toBe('{"a":1}');
  });

  it('should return the text unchanged when no stop occurs', () => {
    expect(applyStopSequences('{"a":1}', ['###'])).toBe('{"a":1}');
  });

  it('should ignore empty stop sequences', () => {
    expect(applyStopSequences('abc', [''])).toBe('abc');
  });

  it('should return the text unchanged without stop sequences', () => {
    expect(applyStopSequences('abc')).toBe('abc');
    expect(applyStopSequences('abc', [])).toBe('abc');
  });
});

describe('isAIPlatform', () => {
  it('should accept known platforms only', () => {
    expect(isAIPlatform('gemini')).toBe(true);
    expect(isAIPlatform('claude')).toBe(true);
    expect(isAIPlatform('Gemini')).toBe(false);
    expect(isAIPlatform('codex')).toBe(false);
  });
});
