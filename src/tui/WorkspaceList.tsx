import React from "react";
import { Box, Text } from "ink";
import { ScrollableList } from "./ScrollableList.js";
import type { WorkspaceGroup } from "../sessions/groups.js";
import { tildify } from "../utils/paths.js";

interface WorkspaceListProps {
  groups: WorkspaceGroup[];
  isActive: boolean;
  selectedIndex: number;
  onSelectedChange: (index: number) => void;
  height: number;
}

export function WorkspaceList({
  groups,
  isActive,
  selectedIndex,
  onSelectedChange,
  height,
}: WorkspaceListProps) {
  const borderColor = isActive ? "yellow" : "gray";

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      borderColor={borderColor}
      width="100%"
    >
      <Box>
        <Text bold> Workspaces </Text>
        <Text dimColor>[{groups.length}]</Text>
      </Box>
      <ScrollableList
        items={groups}
        height={height}
        isActive={isActive}
        selectedIndex={selectedIndex}
        onSelectedChange={onSelectedChange}
        emptyLabel="(no sessions indexed)"
        renderItem={(group, _index, isSelected) => (
          <Text wrap="truncate">
            {isSelected ? (
              <Text color="yellow" bold>{"> "}</Text>
            ) : (
              <Text>{"  "}</Text>
            )}
            <Text color={isSelected ? "yellow" : undefined} bold={isSelected}>
              {tildify(group.workspace)}
            </Text>
            <Text dimColor> ({group.sessions.length})</Text>
          </Text>
        )}
      />
    </Box>
  );
}
