import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { filterCommands, type CommandInfo } from '../commands.js';

interface InputPromptProps {
  onSubmit: (text: string) => void;
  disabled?: boolean;
  /** Images queued for the next message. */
  attachmentCount?: number;
  commands: CommandInfo[];
}

const MAX_VISIBLE = 8;

function AutocompleteMenu({
  suggestions,
  selectedIndex,
}: {
  suggestions: CommandInfo[];
  selectedIndex: number;
}): React.ReactElement {
  // Keep the selection on screen when it moves past the first page.
  const start = Math.max(0, Math.min(selectedIndex - MAX_VISIBLE + 1, suggestions.length - MAX_VISIBLE));
  const visible = suggestions.slice(start, start + MAX_VISIBLE);

  return (
    <Box flexDirection="column" marginLeft={2}>
      {visible.map((cmd, i) => {
        const selected = start + i === selectedIndex;
        return (
          <Box key={cmd.name} gap={1}>
            <Text color={selected ? 'blue' : undefined} bold={selected}>
              {selected ? '▸' : ' '}/{cmd.name}
            </Text>
            {cmd.usage && <Text color="gray">{cmd.usage}</Text>}
            <Text dimColor>{cmd.description}</Text>
          </Box>
        );
      })}
      {suggestions.length > MAX_VISIBLE && (
        <Text dimColor>  {suggestions.length - MAX_VISIBLE} more, keep typing to narrow</Text>
      )}
    </Box>
  );
}

export function InputPrompt({
  onSubmit,
  disabled,
  attachmentCount = 0,
  commands,
}: InputPromptProps): React.ReactElement {
  const [value, setValue] = useState('');
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [menuDismissed, setMenuDismissed] = useState(false);

  const slashQuery = value.startsWith('/') ? value.slice(1).split(' ')[0] ?? '' : null;
  const hasArgsAfterCommand = value.startsWith('/') && value.includes(' ');
  const suggestions = slashQuery !== null && !hasArgsAfterCommand && !menuDismissed
    ? filterCommands(commands, slashQuery)
    : [];
  const showMenu = suggestions.length > 0 && !disabled;

  const handleChange = (newValue: string) => {
    setValue(newValue);
    setMenuDismissed(false);
    setSelectedIndex(0);
  };

  const handleSubmit = (text: string) => {
    const trimmed = text.trim();
    if (!trimmed) return;
    onSubmit(trimmed);
    setValue('');
    setSelectedIndex(0);
    setMenuDismissed(false);
  };

  useInput((_input, key) => {
    if (key.tab && showMenu) {
      const selected = suggestions[selectedIndex];
      if (selected) {
        setValue('/' + selected.name + ' ');
        setSelectedIndex(0);
      }
      return;
    }

    if (key.upArrow && showMenu) {
      setSelectedIndex(prev => Math.max(0, prev - 1));
      return;
    }

    if (key.downArrow && showMenu) {
      setSelectedIndex(prev => Math.min(suggestions.length - 1, prev + 1));
      return;
    }

    if (key.escape && showMenu) {
      setMenuDismissed(true);
    }
  }, { isActive: !disabled });

  return (
    <Box flexDirection="column">
      {showMenu && (
        <AutocompleteMenu suggestions={suggestions} selectedIndex={selectedIndex} />
      )}
      <Box marginTop={showMenu ? 0 : 1}>
        {attachmentCount > 0 && (
          <Text color="magenta" bold>[+{attachmentCount} {attachmentCount === 1 ? 'image' : 'images'}] </Text>
        )}
        <Text color={disabled ? 'gray' : 'blue'} bold>{'❯'} </Text>
        {disabled ? (
          <Text dimColor>Waiting for response... (Ctrl+C to cancel)</Text>
        ) : (
          <TextInput
            value={value}
            onChange={handleChange}
            onSubmit={handleSubmit}
            placeholder="Type a message or / for commands..."
          />
        )}
      </Box>
    </Box>
  );
}
