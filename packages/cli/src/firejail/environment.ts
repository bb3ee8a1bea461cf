// pattern: Functional Core
// Environment edits recorded by the command builder, applied on spawn.

/**
 * Pending changes to the child environment.
 * A `null` value removes the variable from the inherited environment.
 */
export interface EnvironmentEdits {
  clear: boolean;
  vars: Map<string, string | null>;
}

export function createEnvironmentEdits(): EnvironmentEdits {
  return { clear: false, vars: new Map() };
}

export function clearEnvironment(edits: EnvironmentEdits): void {
  edits.clear = true;
  edits.vars.clear();
}

export function setVariable(
  edits: EnvironmentEdits,
  key: string,
  value: string
): void {
  edits.vars.set(key, value);
}

export function removeVariable(edits: EnvironmentEdits, key: string): void {
  if (edits.clear) {
    // Nothing is inherited after a clear, so forgetting the key is enough
    edits.vars.delete(key);
  } else {
    edits.vars.set(key, null);
  }
}

/**
 * Compute the environment the child sees.
 * Equivalent to applying every edit to the parent environment in call order.
 */
export function resolveEnvironment(
  parentEnv: NodeJS.ProcessEnv,
  edits: EnvironmentEdits
): Record<string, string> {
  const env: Record<string, string> = {};

  if (!edits.clear) {
    for (const [key, value] of Object.entries(parentEnv)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }
  }

  for (const [key, value] of edits.vars) {
    if (value === null) {
      delete env[key];
    } else {
      env[key] = value;
    }
  }

  return env;
}
