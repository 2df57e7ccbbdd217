import { GKE_API } from './constants.js';
import { CredentialsError } from './errors.js';
import { serviceAccountKeySchema } from './schemas/credentials.js';

/**
 * Where the provider credentials come from. When both are set the path wins.
 */
export interface CredentialSource {
  /** Path to a service-account key file */
  credentialPath?: string;
  /** Literal content of a service-account key file */
  credentialContent?: string;
}

/**
 * Options handed to the provider client. Credentials are always passed
 * explicitly; nothing is read from or written to the process environment.
 */
export type ResolvedCredentials = {
  keyFilename?: string;
  credentials?: { client_email: string; private_key: string };
  projectId?: string;
  scopes: string[];
};

/**
 * Turn a credential source into client options.
 * With neither field set the client falls back to the host's default credentials.
 */
export function resolveCredentials(source: CredentialSource): ResolvedCredentials {
  const scopes = [GKE_API.scope];

  if (source.credentialPath) {
    return { keyFilename: source.credentialPath, scopes };
  }

  if (source.credentialContent) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(source.credentialContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CredentialsError(`Credential content is not valid JSON: ${message}`);
    }

    const key = serviceAccountKeySchema.safeParse(parsed);
    if (!key.success) {
      const fields = key.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new CredentialsError(`Credential content is missing fields: ${fields}`);
    }

    return {
      credentials: { client_email: key.data.client_email, private_key: key.data.private_key },
      projectId: key.data.project_id,
      scopes,
    };
  }

  return { scopes };
}
