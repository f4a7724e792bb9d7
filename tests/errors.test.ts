import { describe, it, expect } from 'vitest';

import {
  AuthorizationError,
  BaseError,
  CollectionError,
  ConfigurationError,
  DelegationError,
  InventoryError,
  SecondaryLookupError,
  mapDelegationError
} from '../src/errors.js';

const ROLE_ARN = 'arn:aws:iam::111111111111:role/InventoryReader';

describe('errors', () => {
  describe('InventoryError', () => {
    it('should extract AWS metadata from the wrapped cause', () => {
      const cause = {
        name: 'ThrottlingException',
        message: 'Rate exceeded',
        $metadata: { httpStatusCode: 400, requestId: 'req-1' },
      };

      const error = new InventoryError('listing throttled', { original: cause });

      expect(error).toBeInstanceOf(BaseError);
      expect(error.code).toBe('ThrottlingException');
      expect(error.statusCode).toBe(400);
      expect(error.requestId).toBe('req-1');
      expect(error.awsMessage).toBe('Rate exceeded');
      expect(error.original).toBe(cause);
    });

    it('should default to status 500 without a cause', () => {
      const error = new InventoryError('boom');

      expect(error.statusCode).toBe(500);
      expect(error.retriable).toBe(false);
      expect(error.toString()).toBe('InventoryError | boom');
    });

    it('should serialize with toJSON', () => {
      const cause = new Error('socket hang up');
      const json = new InventoryError('request failed', { original: cause }).toJSON();

      expect(json.name).toBe('InventoryError');
      expect(json.message).toBe('request failed');
      expect(json.original).toEqual({ name: 'Error', message: 'socket hang up' });
    });
  });

  describe('ConfigurationError', () => {
    it('should carry its violations', () => {
      const error = new ConfigurationError('invalid', { violations: ['accounts', 'regions'] });

      expect(error.name).toBe('ConfigurationError');
      expect(error.statusCode).toBe(400);
      expect(error.violations).toEqual(['accounts', 'regions']);
    });
  });

  describe('CollectionError', () => {
    it('should record the unit identity', () => {
      const error = new CollectionError('listing failed', {
        service: 'rds',
        accountId: '111111111111',
        region: 'eu-west-1',
      });

      expect(error).toBeInstanceOf(InventoryError);
      expect(error.service).toBe('rds');
      expect(error.accountId).toBe('111111111111');
      expect(error.region).toBe('eu-west-1');
    });
  });

  describe('SecondaryLookupError', () => {
    it('should be retriable', () => {
      const error = new SecondaryLookupError('tags unavailable', { service: 'rds', resource: 'arn:aws:rds:db' });

      expect(error.retriable).toBe(true);
      expect(error.resource).toBe('arn:aws:rds:db');
    });
  });

  describe('mapDelegationError', () => {
    it('should map AccessDenied to AuthorizationError', () => {
      const cause = Object.assign(new Error('not authorized'), { name: 'AccessDenied' });

      const error = mapDelegationError(cause, { roleArn: ROLE_ARN, sessionName: 'inventory-collector' });

      expect(error).toBeInstanceOf(AuthorizationError);
      expect(error).toBeInstanceOf(DelegationError);
      expect(error.message).toBe(`Not authorized to assume role: ${ROLE_ARN}`);
      expect(error.statusCode).toBe(403);
      expect(error.roleArn).toBe(ROLE_ARN);
      expect(error.original).toBe(cause);
    });

    it('should map an HTTP 403 to AuthorizationError', () => {
      const cause = { name: 'Forbidden', $metadata: { httpStatusCode: 403 } };

      expect(mapDelegationError(cause, { roleArn: ROLE_ARN })).toBeInstanceOf(AuthorizationError);
    });

    it('should map any other failure to DelegationError', () => {
      const error = mapDelegationError(new Error('connect ETIMEDOUT'), { roleArn: ROLE_ARN });

      expect(error).not.toBeInstanceOf(AuthorizationError);
      expect(error.message).toBe(`Failed to assume role ${ROLE_ARN}: connect ETIMEDOUT`);
      expect(error.description).toBe('connect ETIMEDOUT');
    });

    it('should pass delegation errors through unchanged', () => {
      const original = new DelegationError('no credentials', { roleArn: ROLE_ARN });

      expect(mapDelegationError(original)).toBe(original);
    });
  });
});
