import { describe, it, expect } from 'vitest';
import {
  buildTranscriptSnippet,
  joinTranscript,
  NO_TRANSCRIPT,
  truncateSnippet,
} from './transcript.js';

describe('joinTranscript', () => {
  it('should prefix each line with the speaker', () => {
    const text = joinTranscript([
      { speakerName: 'Ada', text: 'Hello there.' },
      { speakerName: 'Grace', text: 'Hi!' },
    ]);

    expect(text).toBe('Ada: Hello there.\nGrace: Hi!');
  });

  it('should default missing speakers to Unknown', () => {
    expect(joinTranscript([{ text: 'Who said this?' }, { speakerName: null, text: 'Me.' }])).toBe(
      'Unknown: Who said this?\nUnknown: Me.',
    );
  });

  it('should skip segments without text', () => {
    expect(
      joinTranscript([
        { speakerName: 'Ada', text: '' },
        { speakerName: 'Ada', text: null },
        { speakerName: 'Grace', text: 'Only me.' },
      ]),
    ).toBe('Grace: Only me.');
  });
});

describe('truncateSnippet', () => {
  it('should cut a 250-character body to 200 characters plus an ellipsis', () => {
    const body = 'a'.repeat(250);
    const snippet = truncateSnippet(body);

    expect(snippet).toBe(`${'a'.repeat(200)}...`);
    expect(snippet).toHaveLength(203);
  });

  it('should leave a 150-character body unchanged', () => {
    const body = 'b'.repeat(150);
    expect(truncateSnippet(body)).toBe(body);
  });

  it('should leave a body of exactly 200 characters unchanged', () => {
    const body = 'c'.repeat(200);
    expect(truncateSnippet(body)).toBe(body);
  });

  it('should keep an emoji whole when it sits on the boundary', () => {
    const snippet = truncateSnippet(`${'a'.repeat(199)}${'😀'.repeat(10)}`);

    expect(snippet).toBe(`${'a'.repeat(199)}😀...`);
    expect(snippet).toHaveLength(204);
  });

  it('should count an emoji as one character', () => {
    const body = '😀'.repeat(200);
    expect(truncateSnippet(body)).toBe(body);
  });
});

describe('buildTranscriptSnippet', () => {
  it('should return the sentinel for an empty transcript', () => {
    expect(buildTranscriptSnippet([])).toBe(NO_TRANSCRIPT);
  });

  it('should return the sentinel when every segment is empty', () => {
    expect(buildTranscriptSnippet([{ speakerName: 'Ada', text: '' }])).toBe(
      'No transcript available',
    );
  });
});
