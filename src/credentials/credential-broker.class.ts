import { STSClient, AssumeRoleCommand, type AssumeRoleCommandInput } from '@aws-sdk/client-sts';
import { EC2Client } from '@aws-sdk/client-ec2';
import { S3Client } from '@aws-sdk/client-s3';
import { RDSClient } from '@aws-sdk/client-rds';
import { WorkSpacesClient } from '@aws-sdk/client-workspaces';

import { ConfigurationError, DelegationError, mapDelegationError } from '../errors.js';
import { createSilentLogger, type Logger } from '../concerns/logger.js';
import { isServiceName, type ServiceName } from '../regions.js';
import type { DelegatedCredential } from '../types/inventory.types.js';

/** Client type built for each service */
export interface ServiceClientMap {
  ec2: EC2Client;
  s3: S3Client;
  rds: RDSClient;
  workspaces: WorkSpacesClient;
}

export type ServiceHandle = ServiceClientMap[ServiceName];

export interface ServiceClientConfig {
  region: string;
  credentials: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken: string;
    expiration?: Date;
  };
  maxAttempts: number;
}

type ClientFactoryMap = { [S in ServiceName]: (config: ServiceClientConfig) => ServiceClientMap[S] };

const CLIENT_FACTORIES: ClientFactoryMap = {
  ec2: config => new EC2Client(config),
  s3: config => new S3Client(config),
  rds: config => new RDSClient(config),
  workspaces: config => new WorkSpacesClient(config),
};

export interface AssumeRoleParams {
  roleArn: string;
  sessionName: string;
  externalId?: string;
  region: string;
}

export interface CredentialBrokerOptions {
  stsClientFactory?: (region: string) => STSClient;
  logger?: Logger;
  /** Attempts per SDK call; retries belong to the caller, so the default is a single attempt */
  maxAttempts?: number;
}

/**
 * Contract the orchestrator depends on. `CredentialBroker` is the STS-backed
 * implementation.
 */
export interface CredentialProvider {
  assume(params: AssumeRoleParams): Promise<DelegatedCredential>;
  buildClient<S extends ServiceName>(service: S, credential: DelegatedCredential, region: string): ServiceClientMap[S];
}

export class CredentialBroker implements CredentialProvider {
  private readonly stsClientFactory: (region: string) => STSClient;
  private readonly logger: Logger;
  private readonly maxAttempts: number;

  constructor(options: CredentialBrokerOptions = {}) {
    const { stsClientFactory, logger, maxAttempts = 1 } = options;
    this.maxAttempts = maxAttempts;
    this.stsClientFactory = stsClientFactory ?? (region => new STSClient({ region, maxAttempts: this.maxAttempts }));
    this.logger = (logger ?? createSilentLogger()).child({ component: 'CredentialBroker' });
  }

  async assume(params: AssumeRoleParams): Promise<DelegatedCredential> {
    const { roleArn, sessionName, externalId, region } = params;
    if (!roleArn) {
      throw new ConfigurationError('Cannot assume a role without a role ARN', { violations: ['roleArn'] });
    }

    const input: AssumeRoleCommandInput = {
      RoleArn: roleArn,
      RoleSessionName: sessionName,
    };
    if (externalId) {
      input.ExternalId = externalId;
    }

    const client = this.stsClientFactory(region);
    try {
      const response = await client.send(new AssumeRoleCommand(input));
      const credentials = response.Credentials;
      if (!credentials?.AccessKeyId || !credentials.SecretAccessKey || !credentials.SessionToken) {
        throw new DelegationError(`Assume role returned no credentials for ${roleArn}`, { roleArn, sessionName });
      }

      this.logger.debug({ roleArn, region, expiration: credentials.Expiration }, 'role assumed');

      return {
        accessKeyId: credentials.AccessKeyId,
        secretAccessKey: credentials.SecretAccessKey,
        sessionToken: credentials.SessionToken,
        expiration: credentials.Expiration,
      };
    } catch (err) {
      const mapped = mapDelegationError(err, { roleArn, sessionName });
      this.logger.warn({ roleArn, region, err: mapped }, 'assume role failed');
      throw mapped;
    } finally {
      client.destroy();
    }
  }

  buildClient<S extends ServiceName>(service: S, credential: DelegatedCredential, region: string): ServiceClientMap[S] {
    if (!isServiceName(service)) {
      throw new ConfigurationError(`Unknown service: ${String(service)}`, { violations: ['service'] });
    }
    if (!region) {
      throw new ConfigurationError(`Region is required to build a ${service} client`, { violations: ['region'] });
    }

    const factory: ClientFactoryMap[S] = CLIENT_FACTORIES[service];
    return factory({
      region,
      credentials: {
        accessKeyId: credential.accessKeyId,
        secretAccessKey: credential.secretAccessKey,
        sessionToken: credential.sessionToken,
        expiration: credential.expiration,
      },
      maxAttempts: this.maxAttempts,
    });
  }
}

export default CredentialBroker;
