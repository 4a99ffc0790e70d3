import React from 'react';
import { Box, Text } from 'ink';
import { nextCharLength } from '../../../main/launcher-session.js';
import type { SearchMode } from '../../../main/types.js';
import { MODE_PROMPTS, theme } from '../utils/theme.js';

interface QueryLineProps {
  mode: SearchMode;
  query: string;
  cursor: number;
}

/** The character under the cursor is a whole code point, or a space at the end. */
export function splitAtCursor(query: string, cursor: number): { before: string; atCursor: string; after: string } {
  const width = nextCharLength(query, cursor);
  return {
    before: query.slice(0, cursor),
    atCursor: query.slice(cursor, cursor + width) || ' ',
    after: query.slice(cursor + width),
  };
}

const QueryLine: React.FC<QueryLineProps> = ({ mode, query, cursor }) => {
  const { before, atCursor, after } = splitAtCursor(query, cursor);

  return (
    <Box>
      <Text color={theme.accent} bold>
        {MODE_PROMPTS[mode]}
      </Text>
      <Text color={theme.muted}>{' › '}</Text>
      <Text color={theme.text}>{before}</Text>
      <Text inverse>{atCursor}</Text>
      <Text color={theme.text}>{after}</Text>
    </Box>
  );
};

export default QueryLine;
