export type SlashCommandType =
  | 'help'
  | 'clear'
  | 'model'
  | 'persona'
  | 'profile'
  | 'temp'
  | 'summarize'
  | 'context'
  | 'tokens'
  | 'search'
  | 'save'
  | 'sessions'
  | 'load'
  | 'delete'
  | 'tag'
  | 'untag'
  | 'title'
  | 'retry'
  | 'edit'
  | 'img'
  | 'export'
  | 'markdown'
  | 'quit'
  | 'unknown';

export interface SlashCommand {
  type: SlashCommandType;
  args: string;
  raw: string;
}

export interface CommandInfo {
  name: string;
  aliases?: string[];
  usage?: string;
  description: string;
  type: Exclude<SlashCommandType, 'unknown'>;
}

export const BUILT_IN_COMMANDS: CommandInfo[] = [
  { name: 'help', aliases: ['?'], description: 'Show available commands', type: 'help' },
  { name: 'clear', aliases: ['new'], description: 'Start a new conversation', type: 'clear' },
  { name: 'model', usage: '<name>', description: 'Switch model, keeping the conversation', type: 'model' },
  { name: 'persona', usage: '[name|off]', description: 'List or switch personas', type: 'persona' },
  { name: 'profile', usage: '[name|off]', description: 'List or switch profiles', type: 'profile' },
  { name: 'temp', usage: '[value|off]', description: 'Show or override the temperature', type: 'temp' },
  { name: 'summarize', description: 'Fold older messages into the summary now', type: 'summarize' },
  { name: 'context', description: 'Show context size and summary settings', type: 'context' },
  { name: 'tokens', description: 'Show token usage for this conversation', type: 'tokens' },
  { name: 'search', usage: '<text>', description: 'Search this conversation', type: 'search' },
  { name: 'save', description: 'Save this conversation', type: 'save' },
  { name: 'sessions', description: 'List saved sessions', type: 'sessions' },
  { name: 'load', usage: '<ref>', description: 'Load a session by number, id or id prefix', type: 'load' },
  { name: 'delete', usage: '<ref>', description: 'Delete a saved session', type: 'delete' },
  { name: 'tag', usage: '<tag>', description: 'Tag this conversation', type: 'tag' },
  { name: 'untag', usage: '<tag>', description: 'Remove a tag', type: 'untag' },
  { name: 'title', usage: '<text>', description: 'Rename this conversation', type: 'title' },
  { name: 'retry', description: 'Regenerate the last reply', type: 'retry' },
  { name: 'edit', usage: '<text>', description: 'Rewrite your last message and ask again', type: 'edit' },
  { name: 'img', usage: '<path> [prompt]', description: 'Attach an image', type: 'img' },
  { name: 'export', usage: '[md|json|txt]', description: 'Export this conversation', type: 'export' },
  { name: 'markdown', usage: '[on|off]', description: 'Toggle markdown rendering', type: 'markdown' },
  { name: 'quit', aliases: ['exit', 'q'], description: 'Leave parley', type: 'quit' },
];

const COMMAND_TYPES = new Map<string, CommandInfo['type']>(
  BUILT_IN_COMMANDS.flatMap(cmd => [cmd.name, ...(cmd.aliases ?? [])].map(name => [name, cmd.type] as const)),
);

export function getCommandList(): CommandInfo[] {
  return BUILT_IN_COMMANDS;
}

/**
 * Filter commands by prefix match against the query string (without leading slash).
 */
export function filterCommands(commands: CommandInfo[], query: string): CommandInfo[] {
  const q = query.toLowerCase();
  if (!q) return commands;
  return commands.filter(cmd => {
    if (cmd.name.startsWith(q)) return true;
    return cmd.aliases?.some(alias => alias.startsWith(q)) ?? false;
  });
}

/**
 * Parse a slash command from user input.
 * Returns null if the input is not a slash command.
 */
export function parseSlashCommand(input: string): SlashCommand | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith('/')) return null;

  const spaceIndex = trimmed.search(/\s/);
  const command = spaceIndex === -1
    ? trimmed.slice(1).toLowerCase()
    : trimmed.slice(1, spaceIndex).toLowerCase();
  const args = spaceIndex === -1 ? '' : trimmed.slice(spaceIndex + 1).trim();

  if (!command) return null;

  return { type: COMMAND_TYPES.get(command) ?? 'unknown', args, raw: trimmed };
}
