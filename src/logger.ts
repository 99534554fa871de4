import debug, { type Debugger } from 'debug';

const ROOT = debug('markdown-live-preview');

export type Logger = Debugger;

/**
 * Namespaced logger, e.g. `makeLogger('widgets')` writes under
 * `markdown-live-preview:widgets`. Silent unless enabled through `DEBUG`.
 */
export function makeLogger(namespace: string): Logger {
  return ROOT.extend(namespace);
}
