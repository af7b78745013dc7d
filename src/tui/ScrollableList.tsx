import React from "react";
import { Box, Text, useInput } from "ink";

interface ScrollableListProps<T> {
  items: T[];
  height: number;
  isActive: boolean;
  selectedIndex: number;
  onSelectedChange: (index: number) => void;
  renderItem: (item: T, index: number, isSelected: boolean) => React.ReactNode;
  onSelect?: (item: T, index: number) => void;
  emptyLabel?: string;
}

/**
 * Windowed list with a controlled selection; the window follows the
 * selected row.
 */
export function ScrollableList<T>({
  items,
  height,
  isActive,
  selectedIndex,
  onSelectedChange,
  renderItem,
  onSelect,
  emptyLabel = "(empty)",
}: ScrollableListProps<T>) {
  useInput(
    (input, key) => {
      if (input === "j" || key.downArrow) {
        onSelectedChange(Math.min(items.length - 1, selectedIndex + 1));
      }
      if (input === "k" || key.upArrow) {
        onSelectedChange(Math.max(0, selectedIndex - 1));
      }
      const selected = items[selectedIndex];
      if (key.return && onSelect && selected !== undefined) {
        onSelect(selected, selectedIndex);
      }
    },
    { isActive },
  );

  if (items.length === 0) {
    return (
      <Box height={height}>
        <Text dimColor>  {emptyLabel}</Text>
      </Box>
    );
  }

  const start = Math.max(0, selectedIndex - height + 1);
  const visible = items.slice(start, start + height);

  return (
    <Box flexDirection="column" height={height}>
      {visible.map((item, i) => {
        const realIndex = start + i;
        return (
          <Box key={`item-${realIndex}`}>
            {renderItem(item, realIndex, realIndex === selectedIndex)}
          </Box>
        );
      })}
    </Box>
  );
}
