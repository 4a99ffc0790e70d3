import React from 'react';
import { Box, Text } from 'ink';
import type { SessionSnapshot } from '../../../main/launcher-session.js';
import { theme } from '../utils/theme.js';

type StatusLineProps = Pick<
  SessionSnapshot,
  'results' | 'searching' | 'scannedEntries' | 'status' | 'hiddenDormantCount' | 'selectedLaunchMode' | 'mode'
>;

export function describeResults(props: StatusLineProps): string {
  const parts = [`${props.results.length} ${props.results.length === 1 ? 'result' : 'results'}`];
  if (props.searching) parts.push(`scanning… ${props.scannedEntries}`);
  else if (props.mode === 'files') parts.push(`${props.scannedEntries} scanned`);
  if (props.hiddenDormantCount > 0) parts.push(`${props.hiddenDormantCount} dormant hidden`);
  if (props.selectedLaunchMode) parts.push(props.selectedLaunchMode);
  return parts.join(' · ');
}

const StatusLine: React.FC<StatusLineProps> = (props) => {
  const { status } = props;
  return (
    <Box>
      <Text color={theme.subtle}>{describeResults(props)}</Text>
      {status ? (
        <>
          <Text color={theme.muted}>{'  '}</Text>
          <Text color={status.kind === 'error' ? theme.error : theme.info} wrap="truncate-end">
            {status.text}
          </Text>
        </>
      ) : null}
    </Box>
  );
};

export default StatusLine;
