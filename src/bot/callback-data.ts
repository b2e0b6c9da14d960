import { CallbackPrefix } from './constants';

export interface ParsedCallback {
  prefix: CallbackPrefix;
  action: string;
  /** Everything after `<action>_`; empty when the action has no argument. */
  arg: string;
}

const PREFIXES = Object.values(CallbackPrefix);

/** Builds `<prefix><action>[_<arg>...]`. */
export function callbackData(prefix: CallbackPrefix, action: string, ...args: Array<string | number>): string {
  return [`${prefix}${action}`, ...args].join('_');
}

/**
 * Splits callback data into prefix, action and argument. The longest action
 * that matches wins, so `search_name` is not read as `search` + `name`.
 */
export function parseCallback(data: string, actions: Record<CallbackPrefix, readonly string[]>): ParsedCallback | null {
  const prefix = PREFIXES.find(candidate => data.startsWith(candidate));
  if (!prefix) {
    return null;
  }
  const rest = data.slice(prefix.length);
  const action = [...actions[prefix]]
    .sort((a, b) => b.length - a.length)
    .find(candidate => rest === candidate || rest.startsWith(`${candidate}_`));
  if (action === undefined) {
    return null;
  }
  return { prefix, action, arg: rest.slice(action.length + 1) };
}

/** Splits `a_b_c` into its first part and the rest (`a`, `b_c`). */
export function splitArg(arg: string): [string, string] {
  const index = arg.indexOf('_');
  return index === -1 ? [arg, ''] : [arg.slice(0, index), arg.slice(index + 1)];
}
