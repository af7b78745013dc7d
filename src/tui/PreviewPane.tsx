import React, { useMemo } from "react";
import { Box, Text, useInput } from "ink";
import type { SessionRecord } from "../schemas/transcript.js";
import { readTranscript } from "../transcripts/source.js";
import { previewLines } from "../transcripts/preview.js";
import { useScrollPosition } from "./hooks/useScrollPosition.js";
import { previewLineStyle } from "./utils/previewStyle.js";

interface PreviewPaneProps {
  session: SessionRecord | null;
  limit: number;
  isActive: boolean;
  height: number;
}

export function PreviewPane({ session, limit, isActive, height }: PreviewPaneProps) {
  const lines = useMemo(() => {
    if (!session) return [];
    const read = readTranscript(session.transcriptPath);
    return read.ok ? previewLines(read.transcript, limit) : [];
  }, [session?.transcriptPath, limit]);

  const scroll = useScrollPosition(lines.length, height, session?.transcriptPath);

  useInput(
    (input, key) => {
      if (input === "j" || key.downArrow) scroll.scrollBy(1);
      if (input === "k" || key.upArrow) scroll.scrollBy(-1);
      if (input === "d") scroll.scrollBy(Math.floor(height / 2));
      if (input === "u") scroll.scrollBy(-Math.floor(height / 2));
    },
    { isActive },
  );

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
        {scroll.canScrollUp ? <Text color="yellow"> ▲</Text> : <Text>  </Text>}
        <Text bold> Preview </Text>
        {session && lines.length > 0 && (
          <Text dimColor>
            [{scroll.offset + 1}/{lines.length}]
          </Text>
        )}
        {scroll.canScrollDown ? <Text color="yellow"> ▼</Text> : <Text>  </Text>}
      </Box>
      <Box flexDirection="column" height={height}>
        {!session && <Text dimColor>  Select a session to preview it</Text>}
        {session && lines.length === 0 && (
          <Text dimColor>  (nothing to preview)</Text>
        )}
        {lines.slice(scroll.offset, scroll.offset + height).map((line, i) => {
          const style = previewLineStyle(line);
          return (
            <Text
              key={`line-${scroll.offset + i}`}
              wrap="truncate"
              color={style.color}
              dimColor={style.dim}
            >
              {line}
            </Text>
          );
        })}
      </Box>
    </Box>
  );
}
