export interface SecretStore {
  getSecret(key: string): string | undefined;
  requireSecret(key: string): string;
}

/** Reads secrets from the environment, preferring the prefixed name when both are set. */
export class EnvSecretStore implements SecretStore {
  constructor(
    private readonly prefix = "ENGINE_",
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  getSecret(key: string): string | undefined {
    const value = this.env[`${this.prefix}${key}`] ?? this.env[key];
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  }

  requireSecret(key: string): string {
    const value = this.getSecret(key);
    if (value === undefined) {
      throw new Error(`Missing required secret: ${key}`);
    }
    return value;
  }
}

export const defaultSecretStore = new EnvSecretStore();
