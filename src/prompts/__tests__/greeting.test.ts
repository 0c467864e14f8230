import { describe, it, expect } from 'vitest';
import { greetingPrompt } from '../greeting';

describe('greetingPrompt', () => {
  it('should default to a friendly greeting', () => {
    expect(greetingPrompt('Ada')).toBe('Please write a warm, friendly greeting for someone named Ada.');
  });

  it('should use the requested style', () => {
    expect(greetingPrompt('Ada', 'casual')).toBe('Please write a casual, relaxed greeting for someone named Ada.');
  });

  it('should fall back to friendly for unknown styles', () => {
    expect(greetingPrompt('Ada', 'pirate')).toBe('Please write a warm, friendly greeting for someone named Ada.');
    expect(greetingPrompt('Ada', 'toString')).toBe('Please write a warm, friendly greeting for someone named Ada.');
  });
});
