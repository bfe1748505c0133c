import fs from 'fs';

export type SecretStore = Partial<Record<string, string>>;

/**
 * Reads the persisted secret store: a flat JSON object of string values.
 * A missing file is an empty store; an unreadable one is logged and treated the same.
 */
export function loadSecretStore(storePath: string): SecretStore {
  try {
    if (!fs.existsSync(storePath)) return {};
    const parsed: unknown = JSON.parse(fs.readFileSync(storePath, 'utf8'));
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};

    const store: SecretStore = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') store[key] = value;
    }
    return store;
  } catch (error) {
    console.error({ storePath, error }, 'Failed to read secret store');
    return {};
  }
}
