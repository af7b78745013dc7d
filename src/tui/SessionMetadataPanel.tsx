import React from "react";
import { Box, Text } from "ink";
import type { SessionRecord } from "../schemas/transcript.js";
import { tildify } from "../utils/paths.js";

interface SessionMetadataPanelProps {
  session: SessionRecord | null;
  height: number;
  isActive: boolean;
}

export function metadataRows(session: SessionRecord): Array<[string, string]> {
  return [
    ["Session ID", session.id],
    ["Workspace", tildify(session.workspace)],
    ["Format", session.format],
    ["Updated", session.date],
    ["Model", session.model || "unknown"],
    ["Code edits", session.codeEdits.toString()],
    ["Messages", session.messages.toString()],
    ["Tool calls", session.toolCalls.toString()],
    ["Tokens", `~${session.inputTokens} in / ~${session.outputTokens} out`],
    ["Size", `${session.size} B`],
  ];
}

export function SessionMetadataPanel({
  session,
  height,
  isActive,
}: SessionMetadataPanelProps) {
  const borderColor = isActive ? "yellow" : "gray";

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={borderColor}
      width="100%"
      height={height + 3}
    >
      <Box>
        <Text bold> Details </Text>
      </Box>
      <Box flexDirection="column" height={height}>
        {!session && <Text dimColor>  Select a session to view details</Text>}
        {session &&
          metadataRows(session).map(([label, value]) => (
            <Text key={label} wrap="truncate">
              <Text bold>{`  ${label}: `}</Text>
              <Text dimColor>{value}</Text>
            </Text>
          ))}
      </Box>
    </Box>
  );
}
