import { describe, it, expect } from 'vitest';

import { classifyBatch, classifyRecord } from '../src/classifier.js';

describe('classifier', () => {
  describe('classifyBatch', () => {
    it('should prefer the bucket rule over the instance rule', () => {
      expect(classifyBatch(['bucket_name', 'instance_type'])).toBe('s3');
    });

    it('should classify compute columns', () => {
      expect(classifyBatch(['InstanceID', 'Name', 'Platform'])).toBe('ec2');
    });

    it('should classify database columns', () => {
      expect(classifyBatch(['DBClusterIdentifier', 'Engine'])).toBe('rds');
    });

    it('should classify virtual desktop columns', () => {
      expect(classifyBatch(['WorkspaceID', 'UserName'])).toBe('workspaces');
    });

    it('should ignore column case', () => {
      expect(classifyBatch(new Set(['BUCKETNAME']))).toBe('s3');
    });

    it('should return unknown when nothing matches', () => {
      expect(classifyBatch(['Owner', 'Cost'])).toBe('unknown');
      expect(classifyBatch([])).toBe('unknown');
    });
  });

  describe('classifyRecord', () => {
    it('should honor the internal service tag first', () => {
      expect(classifyRecord({ _service_type: 'RDS', BucketName: 'app-logs' })).toBe('rds');
    });

    it('should use the service field when there is no tag', () => {
      expect(classifyRecord({ service: 'workspaces', InstanceID: 'i-0abc123' })).toBe('workspaces');
    });

    it('should skip tags that do not name a supported service', () => {
      expect(classifyRecord({ _service_type: 'lambda', service: 'ec2' })).toBe('ec2');
      expect(classifyRecord({ _service_type: 'nan', Owner: 'team-a' })).toBe('unknown');
    });

    it('should match resource_type against the keyword rules', () => {
      expect(classifyRecord({ resource_type: 'AWS::S3::Bucket' })).toBe('s3');
      expect(classifyRecord({ resource_type: 'db-cluster' })).toBe('rds');
      expect(classifyRecord({ resource_type: 'EC2' })).toBe('ec2');
    });

    it('should detect instance ids under any field name', () => {
      expect(classifyRecord({ owner_ref: 'i-0abc123' })).toBe('ec2');
      expect(classifyRecord({ image: 'ami-12345' })).toBe('ec2');
    });

    it('should not depend on field order', () => {
      expect(classifyRecord({ BucketName: 'app-logs', Owner: 'i-0abc123' })).toBe('ec2');
      expect(classifyRecord({ Owner: 'i-0abc123', BucketName: 'app-logs' })).toBe('ec2');
    });

    it('should detect bucket endpoints in values', () => {
      expect(classifyRecord({ endpoint: 'assets.bucket.s3.amazonaws.com' })).toBe('s3');
    });

    it('should detect database engine keys with a value', () => {
      expect(classifyRecord({ mysql_version: '8.0' })).toBe('rds');
      expect(classifyRecord({ postgres_host: '' })).toBe('unknown');
    });

    it('should detect workspace keys with a value', () => {
      expect(classifyRecord({ WorkspaceDirectory: 'd-123' })).toBe('workspaces');
    });

    it('should return unknown for empty or loose records', () => {
      expect(classifyRecord({})).toBe('unknown');
      expect(classifyRecord({ Note: null, Extra: undefined })).toBe('unknown');
    });
  });
});
