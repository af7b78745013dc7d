import React from "react";
import { Box, Text } from "ink";
import { ScrollableList } from "./ScrollableList.js";
import type { SessionRecord } from "../schemas/transcript.js";

interface SessionListProps {
  sessions: SessionRecord[];
  isActive: boolean;
  selectedIndex: number;
  onSelectedChange: (index: number) => void;
  onSelect: (session: SessionRecord) => void;
  height: number;
}

export function SessionList({
  sessions,
  isActive,
  selectedIndex,
  onSelectedChange,
  onSelect,
  height,
}: SessionListProps) {
  const borderColor = isActive ? "yellow" : "gray";

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={borderColor}
      width="100%"
    >
      <Box>
        <Text bold> Sessions </Text>
        <Text dimColor>[{sessions.length}]</Text>
      </Box>
      <ScrollableList
        items={sessions}
        height={height}
        isActive={isActive}
        selectedIndex={selectedIndex}
        onSelectedChange={onSelectedChange}
        onSelect={(s) => onSelect(s)}
        renderItem={(session, _index, isSelected) => {
          const summary = (session.summary || "(no summary)").slice(0, 60);
          return (
            <Text wrap="truncate">
              {isSelected ? (
                <Text color="yellow" bold>{"> "}</Text>
              ) : (
                <Text>{"  "}</Text>
              )}
              <Text dimColor>{session.date}</Text>
              <Text> </Text>
              <Text color={isSelected ? "yellow" : undefined} bold={isSelected}>
                {summary}
              </Text>
            </Text>
          );
        }}
      />
    </Box>
  );
}
