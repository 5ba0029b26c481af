/**
 * Unit Tests: error types and status helpers
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  RestClientError,
  StatusError,
  UnexpectedStatusError,
  hasReason,
  isStatus,
  isStatusError,
  operationIdOf,
  type Status,
} from '../../restpoll-sdk/src';

const conflict: Status = {
  kind: 'Status',
  status: 'Failure',
  message: 'jobs "nightly" already exists',
  reason: 'AlreadyExists',
  code: 409,
};

describe('StatusError', () => {
  it('takes message, code and status code from the status', () => {
    const error = new StatusError(conflict, 500);
    expect(error.message).toBe('jobs "nightly" already exists');
    expect(error.code).toBe('AlreadyExists');
    expect(error.statusCode).toBe(409);
    expect(error.status).toBe(conflict);
    expect(error.name).toBe('StatusError');
  });

  it('falls back when the status is sparse', () => {
    const error = new StatusError({ kind: 'Status', status: 'Failure' }, 503);
    expect(error.message).toBe('Request failed with status Failure');
    expect(error.code).toBe('STATUS_FAILURE');
    expect(error.statusCode).toBe(503);
  });

  it('is a RestClientError', () => {
    const error = new StatusError(conflict);
    expect(error).toBeInstanceOf(RestClientError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('error helpers', () => {
  it('narrows status errors', () => {
    expect(isStatusError(new StatusError(conflict))).toBe(true);
    expect(isStatusError(new UnexpectedStatusError(500, ''))).toBe(false);
    expect(isStatusError(new Error('plain'))).toBe(false);
  });

  it('matches status reasons', () => {
    expect(hasReason(new StatusError(conflict), 'AlreadyExists')).toBe(true);
    expect(hasReason(new StatusError(conflict), 'NotFound')).toBe(false);
    expect(hasReason('AlreadyExists', 'AlreadyExists')).toBe(false);
  });

  it('keeps configuration issues', () => {
    const error = new ConfigurationError('bad config', ['host: Invalid url']);
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.issues).toEqual(['host: Invalid url']);
  });
});

describe('isStatus', () => {
  it('accepts status objects', () => {
    expect(isStatus({ kind: 'Status', status: 'Working', details: { id: 'op-1' } })).toBe(true);
    expect(isStatus({ kind: 'Status', status: 'Success' })).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isStatus({ kind: 'Job', status: 'Working' })).toBe(false);
    expect(isStatus({ kind: 'Status', status: 'Pending' })).toBe(false);
    expect(isStatus([{ kind: 'Status', status: 'Success' }])).toBe(false);
    expect(isStatus(null)).toBe(false);
    expect(isStatus('Status')).toBe(false);
  });
});

describe('operationIdOf', () => {
  it('reads the operation name from the details', () => {
    expect(operationIdOf({ kind: 'Status', status: 'Working', details: { id: 'op-3' } })).toBe('op-3');
  });

  it('returns undefined without an id', () => {
    expect(operationIdOf({ kind: 'Status', status: 'Working' })).toBeUndefined();
    expect(operationIdOf({ kind: 'Status', status: 'Working', details: { id: '' } })).toBeUndefined();
  });
});
