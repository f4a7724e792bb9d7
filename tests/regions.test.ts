import { describe, it, expect } from 'vitest';

import {
  GLOBAL_SERVICES,
  SERVICE_CATALOG,
  getRegionDisplayName,
  isGlobalService,
  isServiceName,
  regionsForService
} from '../src/regions.js';
import { COLLECTOR_MAP, createCollector, getSupportedServices } from '../src/collectors/index.js';
import { RdsCollector } from '../src/collectors/rds-collector.class.js';

describe('regions', () => {
  it('should treat object storage as the only global service', () => {
    expect(GLOBAL_SERVICES).toEqual(['s3']);
    expect(isGlobalService('s3')).toBe(true);
    expect(isGlobalService('ec2')).toBe(false);
  });

  it('should limit global services to the first region', () => {
    expect(regionsForService('s3', ['eu-west-1', 'us-east-1'])).toEqual(['eu-west-1']);
    expect(regionsForService('ec2', ['eu-west-1', 'us-east-1'])).toEqual(['eu-west-1', 'us-east-1']);
    expect(regionsForService('s3', [])).toEqual([]);
  });

  it('should name known regions and echo unknown ones', () => {
    expect(getRegionDisplayName('ap-northeast-2')).toBe('Asia Pacific (Seoul)');
    expect(getRegionDisplayName('me-south-1')).toBe('me-south-1');
  });

  it('should recognize service names', () => {
    expect(isServiceName('workspaces')).toBe(true);
    expect(isServiceName('lambda')).toBe(false);
  });

  it('should map every service to its sheet', () => {
    expect(Object.fromEntries(Object.entries(SERVICE_CATALOG).map(([name, entry]) => [name, entry.sheetName]))).toEqual({
      ec2: 'EC2_Instances',
      s3: 'S3_Buckets',
      rds: 'RDS_Instances',
      workspaces: 'WorkSpaces',
    });
  });
});

describe('collector registry', () => {
  it('should provide a collector for every service', () => {
    expect(getSupportedServices()).toEqual(['ec2', 's3', 'rds', 'workspaces']);
    expect(Object.keys(COLLECTOR_MAP)).toHaveLength(4);
  });

  it('should build the variant for a service', () => {
    const collector = createCollector('rds', { accountId: '111111111111', region: 'eu-west-1' });

    expect(collector).toBeInstanceOf(RdsCollector);
    expect(collector.serviceName).toBe('rds');
    expect(collector.sheetName).toBe('RDS_Instances');
    expect(collector.region).toBe('eu-west-1');
  });
});
