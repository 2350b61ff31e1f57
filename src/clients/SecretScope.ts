import { BackupConfig } from '../interfaces/BackupConfig';

export const RESTIC_PASSWORD_ENV = 'RESTIC_PASSWORD';
export const AWS_ACCESS_KEY_ID_ENV = 'AWS_ACCESS_KEY_ID';
export const AWS_SECRET_ACCESS_KEY_ENV = 'AWS_SECRET_ACCESS_KEY';
export const AWS_DEFAULT_REGION_ENV = 'AWS_DEFAULT_REGION';

export class SecretScopeClosedError extends Error {
  constructor() {
    super('Secret scope is closed; secrets are no longer available');
    this.name = 'SecretScopeClosedError';
  }
}

/**
 * Holds secrets destined for child-process environments.
 *
 * The process environment is never modified: each spawned command receives
 * its own copy of process.env overlaid with the secrets. Once closed, the
 * scope forgets every entry and refuses to hand out further environments.
 */
export class SecretScope {
  private entries: Map<string, string>;
  private closed = false;

  constructor(secrets: Record<string, string | undefined>) {
    this.entries = new Map();
    for (const [name, value] of Object.entries(secrets)) {
      if (value !== undefined && value !== '') {
        this.entries.set(name, value);
      }
    }
  }

  /**
   * Environment for one child process
   */
  childEnvironment(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    if (this.closed) {
      throw new SecretScopeClosedError();
    }
    return { ...base, ...Object.fromEntries(this.entries) };
  }

  isOpen(): boolean {
    return !this.closed;
  }

  close(): void {
    this.entries.clear();
    this.closed = true;
  }
}

/**
 * Run body with the secrets available to child processes, releasing them on every exit path
 */
export async function withSecrets<T>(
  secrets: Record<string, string | undefined>,
  body: (scope: SecretScope) => Promise<T> | T
): Promise<T> {
  const scope = new SecretScope(secrets);
  try {
    return await body(scope);
  } finally {
    scope.close();
  }
}

/**
 * Environment entries the backup tool needs for this configuration
 */
export function secretsForConfig(config: BackupConfig): Record<string, string | undefined> {
  const secrets: Record<string, string | undefined> = {
    [RESTIC_PASSWORD_ENV]: config.repositoryPassword,
  };

  if (config.cloudCredentials) {
    secrets[AWS_ACCESS_KEY_ID_ENV] = config.cloudCredentials.accessKeyId;
    secrets[AWS_SECRET_ACCESS_KEY_ENV] = config.cloudCredentials.secretAccessKey;
    secrets[AWS_DEFAULT_REGION_ENV] = config.cloudCredentials.region;
  }

  return secrets;
}
