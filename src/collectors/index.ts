import { Ec2Collector } from './ec2-collector.class.js';
import { S3Collector } from './s3-collector.class.js';
import { RdsCollector } from './rds-collector.class.js';
import { WorkspacesCollector } from './workspaces-collector.class.js';
import type { CollectorOptions, ResourceCollector } from './base-collector.class.js';
import { isServiceName, type ServiceName } from '../regions.js';

export {
  BaseCollector,
  DEFAULT_MAX_PAGES,
  extractNameTag,
  type CollectContext,
  type CollectorOptions,
  type PageRequest,
  type ResourceCollector
} from './base-collector.class.js';
export { Ec2Collector } from './ec2-collector.class.js';
export { S3Collector } from './s3-collector.class.js';
export { RdsCollector } from './rds-collector.class.js';
export { WorkspacesCollector } from './workspaces-collector.class.js';

type CollectorClassMap = { [S in ServiceName]: new (options: CollectorOptions) => ResourceCollector<S> };

export const COLLECTOR_MAP: CollectorClassMap = {
  ec2: Ec2Collector,
  s3: S3Collector,
  rds: RdsCollector,
  workspaces: WorkspacesCollector,
};

export type CollectorFactory = <S extends ServiceName>(service: S, options: CollectorOptions) => ResourceCollector<S>;

export const createCollector: CollectorFactory = (service, options) => {
  const CollectorClass = COLLECTOR_MAP[service];
  return new CollectorClass(options);
};

export function getSupportedServices(): ServiceName[] {
  return Object.keys(COLLECTOR_MAP).filter(isServiceName);
}
