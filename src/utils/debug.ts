/**
 * Tagged debug log
 *
 * Usage:
 *   debug('outline', `corner TR at (${p.x}, ${p.y})`);
 *   debug('nest', `placed ${label} at ${x},${y}`);
 *
 * Control active tags:
 *   enableDebugTag('outline');
 *   setDebugTags(['outline', 'nest']);
 *   PANELCUT_DEBUG=outline,nest npm run generate
 *
 * Messages for inactive tags are dropped. Active messages are buffered;
 * the CLI scripts flush the buffer to stderr when they finish.
 */

let debugLines: string[] = [];
const activeTags = new Set<string>();

/**
 * Log a debug message with a tag. Only recorded if the tag is active.
 */
export const debug = (tag: string, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  debugLines.push(`[${timestamp}] [${tag}] ${content}`);
};

export const enableDebugTag = (tag: string): void => {
  activeTags.add(tag);
};

/**
 * Set all active debug tags (replaces existing)
 */
export const setDebugTags = (tags: string[]): void => {
  activeTags.clear();
  tags.forEach(tag => activeTags.add(tag));
};

/**
 * Enable the comma-separated tags named in an environment value,
 * e.g. `PANELCUT_DEBUG=outline,nest`.
 */
export const enableDebugTagsFromEnv = (value: string | undefined): void => {
  if (!value) return;
  for (const tag of value.split(',')) {
    const trimmed = tag.trim();
    if (trimmed) activeTags.add(trimmed);
  }
};

export const getDebug = (): string => debugLines.join('\n');

export const clearDebug = (): void => {
  debugLines = [];
};

/**
 * Hand the buffered lines to a writer and clear the buffer.
 */
export const flushDebug = (write: (text: string) => void): void => {
  if (debugLines.length === 0) return;
  write(getDebug() + '\n');
  clearDebug();
};
