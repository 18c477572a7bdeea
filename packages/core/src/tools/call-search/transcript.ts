import type { TranscriptSegment } from './types.js';

export const NO_TRANSCRIPT = 'No transcript available';
export const SNIPPET_MAX_LENGTH = 200;

const UNKNOWN_SPEAKER = 'Unknown';

export function joinTranscript(segments: readonly TranscriptSegment[]): string {
  return segments
    .filter((segment) => segment.text)
    .map((segment) => `${segment.speakerName || UNKNOWN_SPEAKER}: ${segment.text ?? ''}`)
    .join('\n');
}

/** Lengths count code points, so an astral character is never split. */
export function truncateSnippet(text: string, maxLength: number = SNIPPET_MAX_LENGTH): string {
  const codePoints = Array.from(text);
  return codePoints.length > maxLength ? `${codePoints.slice(0, maxLength).join('')}...` : text;
}

export function buildTranscriptSnippet(segments: readonly TranscriptSegment[]): string {
  const body = joinTranscript(segments);
  return body ? truncateSnippet(body) : NO_TRANSCRIPT;
}
