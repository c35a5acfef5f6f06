// Credential lookup for the completion API: settings first, environment second.

export interface CredentialSources {
  /** Key from the application settings file, if any. */
  settingsKey?: string;
  /** Name of the environment variable that may hold the key. */
  envVar: string;
  env: NodeJS.ProcessEnv;
}

export function credentialFromSettings(sources: CredentialSources): string | undefined {
  return sources.settingsKey || undefined;
}

export function credentialFromEnv(sources: CredentialSources): string | undefined {
  return sources.env[sources.envVar] || undefined;
}

export function resolveCredential(sources: CredentialSources): string | undefined {
  return credentialFromSettings(sources) ?? credentialFromEnv(sources);
}

/**
 * Preview of a secret safe for logs and health output: first and last four
 * characters when long enough, otherwise just whether it is set.
 */
export function maskCredential(value: string | undefined): string {
  if (!value) return "(missing)";
  if (value.length > 8) return `${value.slice(0, 4)}…${value.slice(-4)}`;
  return "(set)";
}
