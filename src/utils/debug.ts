/**
 * Tagged debug log
 *
 * Usage:
 *   debug('graph', `Snapped ${count} endpoints`);
 *   debug('allowance', `Group ${groupId}: hole collapsed`);
 *
 * Control active tags:
 *   enableDebugTag('layout');
 *   setDebugTags(['patches', 'groups']);
 *   setDebugTags(ALL_DEBUG_TAGS);
 *
 * Lines land in an in-memory buffer (getDebug) and, when a sink is set,
 * are forwarded to it as they are written.
 */

export type DebugTag = 'graph' | 'patches' | 'groups' | 'allowance' | 'layout' | 'pipeline' | 'boolean';

export const ALL_DEBUG_TAGS: DebugTag[] = ['graph', 'patches', 'groups', 'allowance', 'layout', 'pipeline', 'boolean'];

export type DebugSink = (line: string) => void;

let debugContent = '';
let sink: DebugSink | null = null;
const activeTags = new Set<DebugTag>();

const appendLine = (line: string): void => {
  debugContent = debugContent ? debugContent + '\n' + line : line;
  sink?.(line);
};

/**
 * Log a message under a tag. Dropped unless the tag is active.
 */
export const debug = (tag: DebugTag, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  appendLine(`[${timestamp}] [${tag}] ${content}`);
};

export const enableDebugTag = (tag: DebugTag): void => {
  activeTags.add(tag);
};

export const disableDebugTag = (tag: DebugTag): void => {
  activeTags.delete(tag);
};

/**
 * Replace the active tag set
 */
export const setDebugTags = (tags: DebugTag[]): void => {
  activeTags.clear();
  tags.forEach(tag => activeTags.add(tag));
};

export const getDebugTags = (): DebugTag[] => Array.from(activeTags);

export const isDebugTagActive = (tag: DebugTag): boolean => activeTags.has(tag);

/**
 * Forward every written line to `next` (e.g. console.error). Pass null to stop.
 */
export const setDebugSink = (next: DebugSink | null): void => {
  sink = next;
};

/**
 * Append untagged content (always written)
 */
export const appendDebug = (content: string): void => {
  appendLine(content);
};

export const getDebug = (): string => debugContent;

export const hasDebug = (): boolean => debugContent.length > 0;

export const clearDebug = (): void => {
  debugContent = '';
};

/**
 * Format a point list compactly for log lines: (x, y) (x, y) ...
 */
export const formatPoints = (points: { x: number; y: number }[], digits = 4): string =>
  points.map(p => `(${p.x.toFixed(digits)}, ${p.y.toFixed(digits)})`).join(' ');
