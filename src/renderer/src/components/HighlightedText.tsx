import React from 'react';
import { Text } from 'ink';
import { theme } from '../utils/theme.js';

interface Segment {
  text: string;
  matched: boolean;
  dimmed: boolean;
}

/**
 * Splits `text` into runs of matched / unmatched characters. Characters
 * before `dimUntil` belong to the dimmed prefix (a file's parent directory).
 */
export function splitHighlightSegments(text: string, positions: readonly number[], dimUntil = 0): Segment[] {
  const matched = new Set(positions);
  const segments: Segment[] = [];
  for (let i = 0; i < text.length; i++) {
    const isMatched = matched.has(i);
    const isDimmed = i < dimUntil;
    const last = segments[segments.length - 1];
    if (last && last.matched === isMatched && last.dimmed === isDimmed) {
      last.text += text[i];
    } else {
      segments.push({ text: text[i], matched: isMatched, dimmed: isDimmed });
    }
  }
  return segments;
}

interface HighlightedTextProps {
  text: string;
  positions: readonly number[];
  dimUntil?: number;
  color?: string;
}

const HighlightedText: React.FC<HighlightedTextProps> = ({ text, positions, dimUntil = 0, color = theme.text }) => {
  const segments = splitHighlightSegments(text, positions, dimUntil);
  return (
    <Text wrap="truncate-end">
      {segments.map((segment, index) => {
        if (segment.matched) {
          return (
            <Text key={index} color={theme.match} bold>
              {segment.text}
            </Text>
          );
        }
        return (
          <Text key={index} color={segment.dimmed ? theme.muted : color}>
            {segment.text}
          </Text>
        );
      })}
    </Text>
  );
};

export default HighlightedText;
