/**
 * Launcher App
 *
 * One screen: the query line, the status line and the ranked result list,
 * inside a rounded border. All state lives in the `LauncherSession`; this
 * component only renders snapshots and forwards key presses.
 */

import React, { useEffect } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import { describeError } from '../../main/errors.js';
import type { LauncherSession } from '../../main/launcher-session.js';
import { createLogger } from '../../main/logger.js';
import QueryLine from './components/QueryLine.js';
import ResultList from './components/ResultList.js';
import StatusLine from './components/StatusLine.js';
import { useLauncherSession } from './hooks/useLauncherSession.js';
import { useTerminalSize } from './hooks/useTerminalSize.js';
import { translateInput } from './utils/key-bindings.js';
import { theme } from './utils/theme.js';

const log = createLogger('App');

// Border (2) + query line + status line + hint line.
const CHROME_ROWS = 5;

const HINTS = '↵ launch · tab mode · ^t terminal once · ^r remember mode · ^d dormant · esc quit';

interface AppProps {
  session: LauncherSession;
}

const App: React.FC<AppProps> = ({ session }) => {
  const snapshot = useLauncherSession(session);
  const { columns, rows } = useTerminalSize();
  const { exit } = useApp();

  useInput((input, key) => {
    const command = translateInput(input, key);
    if (!command) return;
    session.handleKey(command).catch((error: unknown) => {
      log.error(`Key handling failed: ${describeError(error)}`);
    });
  });

  useEffect(() => {
    if (snapshot.exit) exit();
  }, [snapshot.exit, exit]);

  const listHeight = Math.max(1, rows - CHROME_ROWS);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor={theme.border} paddingX={1} width={columns}>
      <QueryLine mode={snapshot.mode} query={snapshot.query} cursor={snapshot.cursor} />
      <StatusLine
        mode={snapshot.mode}
        results={snapshot.results}
        searching={snapshot.searching}
        scannedEntries={snapshot.scannedEntries}
        status={snapshot.status}
        hiddenDormantCount={snapshot.hiddenDormantCount}
        selectedLaunchMode={snapshot.selectedLaunchMode}
      />
      <ResultList
        results={snapshot.results}
        selectedIndex={snapshot.selectedIndex}
        height={listHeight}
        searching={snapshot.searching}
        forceTerminalKey={snapshot.forceTerminalKey}
      />
      <Text color={theme.muted} wrap="truncate-end">
        {HINTS}
      </Text>
    </Box>
  );
};

export default App;
