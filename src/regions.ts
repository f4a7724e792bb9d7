export const SERVICE_NAMES = ['ec2', 's3', 'rds', 'workspaces'] as const;

export type ServiceName = typeof SERVICE_NAMES[number];

export type ServiceScope = 'global' | 'regional';

export interface ServiceDescriptor {
  label: string;
  sheetName: string;
  scope: ServiceScope;
}

export const SERVICE_CATALOG: Readonly<Record<ServiceName, ServiceDescriptor>> = {
  ec2: { label: 'Compute instances', sheetName: 'EC2_Instances', scope: 'regional' },
  s3: { label: 'Object storage buckets', sheetName: 'S3_Buckets', scope: 'global' },
  rds: { label: 'Managed databases', sheetName: 'RDS_Instances', scope: 'regional' },
  workspaces: { label: 'Virtual desktops', sheetName: 'WorkSpaces', scope: 'regional' },
};

export const GLOBAL_SERVICES: readonly ServiceName[] = SERVICE_NAMES.filter(
  name => SERVICE_CATALOG[name].scope === 'global'
);

export const DEFAULT_REGION = 'ap-northeast-2';

export const DEFAULT_REGIONS: readonly string[] = ['us-east-1', 'ap-northeast-2'];

const REGION_DISPLAY_NAMES: Readonly<Record<string, string>> = {
  'us-east-1': 'US East (N. Virginia)',
  'us-east-2': 'US East (Ohio)',
  'us-west-2': 'US West (Oregon)',
  'eu-west-1': 'Europe (Ireland)',
  'eu-central-1': 'Europe (Frankfurt)',
  'ap-northeast-1': 'Asia Pacific (Tokyo)',
  'ap-northeast-2': 'Asia Pacific (Seoul)',
  'ap-southeast-1': 'Asia Pacific (Singapore)',
};

export function isServiceName(value: string): value is ServiceName {
  return SERVICE_NAMES.some(name => name === value);
}

export function isGlobalService(service: ServiceName): boolean {
  return SERVICE_CATALOG[service].scope === 'global';
}

export function getRegionDisplayName(region: string): string {
  return REGION_DISPLAY_NAMES[region] ?? region;
}

/**
 * Regions a service is collected in. Global services only use the first
 * configured region, whatever the length of the list.
 */
export function regionsForService(service: ServiceName, regions: readonly string[]): string[] {
  if (regions.length === 0) return [];
  const [first] = regions;
  return isGlobalService(service) && first !== undefined ? [first] : [...regions];
}
