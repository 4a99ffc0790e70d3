import React from 'react';
import { Box, Text } from 'ink';
import { getTargetKey, type Candidate } from '../../../main/types.js';
import { computeListWindow } from '../utils/list-window.js';
import { theme } from '../utils/theme.js';
import HighlightedText from './HighlightedText.js';

interface ResultListProps {
  results: readonly Candidate[];
  selectedIndex: number;
  height: number;
  searching: boolean;
  forceTerminalKey: string | null;
}

/** Length of the parent-directory prefix of a root-relative display path. */
export function parentPrefixLength(displayText: string): number {
  const trimmed = displayText.endsWith('/') ? displayText.slice(0, -1) : displayText;
  return trimmed.lastIndexOf('/') + 1;
}

const ResultRow: React.FC<{ candidate: Candidate; selected: boolean; forced: boolean }> = ({
  candidate,
  selected,
  forced,
}) => {
  const payload = candidate.payload;
  const dimUntil = payload.kind === 'path' ? parentPrefixLength(candidate.displayText) : 0;

  return (
    <Box>
      <Text color={theme.accent}>{selected ? '› ' : '  '}</Text>
      <Box flexGrow={1} flexShrink={1}>
        <HighlightedText
          text={candidate.displayText}
          positions={candidate.matchPositions}
          dimUntil={dimUntil}
          color={selected ? theme.accent : theme.text}
        />
      </Box>
      {payload.kind === 'app' && payload.isTerminalApp ? <Text color={theme.terminalMarker}> [term]</Text> : null}
      {forced ? <Text color={theme.match}> [forced]</Text> : null}
    </Box>
  );
};

const ResultList: React.FC<ResultListProps> = ({ results, selectedIndex, height, searching, forceTerminalKey }) => {
  if (results.length === 0) {
    return (
      <Box height={height}>
        <Text color={theme.muted}>{searching ? 'Searching…' : 'No matches'}</Text>
      </Box>
    );
  }

  const { start, end } = computeListWindow(selectedIndex, results.length, height);
  const visible = results.slice(start, end);

  return (
    <Box flexDirection="column" height={height}>
      {visible.map((candidate, offset) => {
        const index = start + offset;
        const payload = candidate.payload;
        return (
          <ResultRow
            key={getTargetKey(payload)}
            candidate={candidate}
            selected={index === selectedIndex}
            forced={payload.kind === 'app' && payload.id === forceTerminalKey}
          />
        );
      })}
    </Box>
  );
};

export default ResultList;
