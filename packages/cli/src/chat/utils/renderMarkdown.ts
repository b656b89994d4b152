import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

// One Marked instance per terminal width; resizing rebuilds it.
const instances = new Map<number, Marked>();

function getMarked(width: number): Marked {
  const existing = instances.get(width);
  if (existing) return existing;

  const marked = new Marked();
  marked.use(
    markedTerminal({
      width,
      reflowText: false,
      showSectionPrefix: false,
      tab: 2,
    }),
  );
  instances.set(width, marked);
  return marked;
}

/** Renders markdown for the terminal; unparseable input comes back as is. */
export function renderMarkdown(content: string, width = 80): string {
  if (!content) return '';
  try {
    const result = getMarked(width).parse(content, { async: false });
    return typeof result === 'string' ? result.replace(/\n+$/, '') : content;
  } catch {
    return content;
  }
}
