/**
 * Debug logging.
 *
 * Off by default. Components prefix their messages with a tag,
 * e.g. `debugLog("[Editor] dispatch undo")`.
 */

export type DebugSink = (message: string) => void;

const defaultSink: DebugSink = (message) => {
  console.debug(message);
};

let enabled = false;
let sink: DebugSink = defaultSink;

export function isDebugEnabled(): boolean {
  return enabled;
}

export function setDebugEnabled(value: boolean): void {
  enabled = value;
}

/** Replace where debug output goes. Pass undefined to restore the console sink. */
export function setDebugSink(next: DebugSink | undefined): void {
  sink = next ?? defaultSink;
}

export function debugLog(message: string): void {
  if (!enabled) return;
  sink(message);
}
