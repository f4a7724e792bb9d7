export const CREDENTIAL_FIELDS = ['accessKeyId', 'secretAccessKey', 'sessionToken', 'externalId'];

export const REDACT_CENSOR = '[redacted]';

export interface RedactRules {
  paths: string[];
  censor: string;
}

export function createRedactRules(extraPaths: string[] = []): RedactRules {
  const paths = CREDENTIAL_FIELDS.flatMap(field => [field, `*.${field}`]);
  return {
    paths: [...paths, ...extraPaths],
    censor: REDACT_CENSOR,
  };
}
