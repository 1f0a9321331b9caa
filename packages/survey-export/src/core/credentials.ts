/**
 * Credential provider seam
 *
 * The pipeline only needs "a name/token pair for every request". Where the
 * pair is stored is the caller's business; the CLI reads it from config.
 */

export interface ApiCredentials {
  readonly name: string;
  readonly token: string;
}

export interface CredentialProvider {
  /** Current credentials, or undefined when none are configured */
  getCredentials(): ApiCredentials | undefined;
}

/**
 * Fixed credentials captured at construction time
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials?: ApiCredentials;

  constructor(name: string | undefined, token: string | undefined) {
    if (name && token) {
      this.credentials = { name, token };
    }
  }

  getCredentials(): ApiCredentials | undefined {
    return this.credentials;
  }

  ready(): boolean {
    return this.credentials !== undefined;
  }
}
