// CHANGE: Ink view of the browser session.
// WHY: Rendering reads snapshots only; every state change goes through session methods.

import React, { useEffect, useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import TextInput from "ink-text-input";
import { applyCommand, FOOTER_HINTS, resolveKey } from "../browser/bindings.js";
import { CATEGORY_LABELS } from "../browser/filter.js";
import type { DetailView } from "../browser/presenter.js";
import type { BrowserSession, SessionSnapshot } from "../browser/session.js";
import type { TableView } from "../browser/table.js";
import { BROWSER } from "../config.js";
import { describeError } from "../errors.js";
import { error as logError } from "../logger.js";
import type { Notification } from "../types.js";
import { formatCells, windowStart } from "./layout.js";

const severityColor: Record<Notification["severity"], string> = {
  information: "green",
  warning: "yellow",
  error: "red"
};

function RepositoryTable({ view }: { readonly view: TableView }): React.ReactElement {
  if (view.kind === "empty") {
    return <Text dimColor>{view.message}</Text>;
  }
  const start = windowStart(view.selectedIndex, view.rows.length, BROWSER.VISIBLE_ROWS);
  const visible = view.rows.slice(start, start + BROWSER.VISIBLE_ROWS);
  return (
    <Box flexDirection="column">
      <Text bold>{formatCells(view.columns)}</Text>
      {visible.map((row, offset) => (
        <Text key={row.key} inverse={start + offset === view.selectedIndex} wrap="truncate">
          {formatCells(row.cells)}
        </Text>
      ))}
    </Box>
  );
}

function DetailPane({ view }: { readonly view: DetailView }): React.ReactElement {
  if (view.kind === "placeholder") {
    return <Text dimColor>{view.text}</Text>;
  }
  return (
    <Box flexDirection="column">
      <Text bold color="cyan">
        {view.title}
      </Text>
      {view.description ? <Text>{view.description}</Text> : null}
      <Box flexDirection="column" marginTop={1}>
        {view.fields.map(field => (
          <Text key={field.label} wrap="truncate">
            <Text bold>{field.label}:</Text> {field.value}
          </Text>
        ))}
      </Box>
      <Box flexDirection="column" marginTop={1}>
        <Text bold>Quick Actions:</Text>
        {view.actions.map(action => (
          <Text key={action.kind}>
            <Text color="magenta">[{action.key}]</Text> {action.label}
          </Text>
        ))}
      </Box>
    </Box>
  );
}

/**
 * Ink view of a browser session; re-renders on every session change.
 */
export function BrowserApp({ session }: { readonly session: BrowserSession }): React.ReactElement {
  const { exit } = useApp();
  const [state, setState] = useState<SessionSnapshot>(() => session.snapshot());

  // The session may have moved on between the first render and this effect.
  useEffect(() => session.subscribe(setState, { replay: true }), [session]);

  useEffect(() => {
    if (state.phase === "terminated") {
      exit();
    }
  }, [state.phase, exit]);

  useInput((input, key) => {
    const command = resolveKey(input, key, state.searchFocused);
    if (command) {
      applyCommand(session, command).catch(error => {
        logError(`Command ${command.type} failed: ${describeError(error)}`);
      });
    }
  });

  const shown = state.table.kind === "rows" ? state.table.rows.length : 0;

  return (
    <Box flexDirection="column">
      <Box justifyContent="space-between">
        <Text bold>{state.title}</Text>
        <Text dimColor>{state.subtitle}</Text>
      </Box>
      <Box>
        <Box flexDirection="column" width="60%" borderStyle="single" paddingX={1}>
          <Box>
            <Text>Search: </Text>
            {state.searchFocused ? (
              <TextInput
                value={state.filter.query}
                onChange={query => session.setQuery(query)}
                placeholder="Search repositories..."
              />
            ) : (
              <Text dimColor={state.filter.query.length === 0}>
                {state.filter.query || "Search repositories... (f)"}
              </Text>
            )}
          </Box>
          <Text>
            Filter: <Text color="cyan">{CATEGORY_LABELS[state.filter.category]}</Text> ({shown}/{state.total})
          </Text>
          {state.phase === "loading" ? <Text color="yellow">Loading repositories...</Text> : null}
          <RepositoryTable view={state.table} />
        </Box>
        <Box flexDirection="column" width="40%" borderStyle="single" paddingX={1}>
          <DetailPane view={state.detail} />
        </Box>
      </Box>
      {state.notifications.slice(-3).map(notification => (
        <Text key={notification.id} color={severityColor[notification.severity]}>
          {notification.message}
        </Text>
      ))}
      <Text dimColor>{FOOTER_HINTS.map(([key, label]) => `${key} ${label}`).join("  ")}</Text>
    </Box>
  );
}
