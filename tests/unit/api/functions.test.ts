/**
 * @fileoverview Unit tests for the Cloud Function exports
 * @module tests/unit/api/functions.test
 */

import { Request, Response } from 'express';
import { onRequest } from 'firebase-functions/v2/https';
import {
  generateTestKeyPair,
  issueTestActivationCode,
  TEST_ISSUER,
} from '../../helpers/activationCodes';

jest.mock('firebase-functions/v2/https', () => ({
  onRequest: jest.fn((_options: unknown, handler: unknown) => handler),
}));

jest.mock('firebase-functions/logger', () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

const mockKeys = generateTestKeyPair();

jest.mock('../../../src/lib/params', () => ({
  activationPublicKey: { value: () => mockKeys.publicKey.replace(/\n/g, '\\n') },
  activationCodeIssuer: { value: () => TEST_ISSUER },
  entitlementRegion: 'europe-west1',
  normalizePem: (value: string) => value.trim().replace(/\\n/g, '\n'),
}));

import * as functions from '../../../src';

const registrations = jest.mocked(onRequest).mock.calls.slice();

describe('Cloud Function exports', () => {
  it('should register the three endpoints on one single-instance deployment', () => {
    expect(registrations).toHaveLength(3);
    for (const call of registrations) {
      expect(call[0]).toEqual({ region: 'europe-west1', cors: true, maxInstances: 1 });
    }
  });

  it('should share one record and verify codes with the configured key', async () => {
    const code = issueTestActivationCode({ privateKey: mockKeys.privateKey });
    const json = jest.fn();
    const res = {
      setHeader: jest.fn(),
      status: jest.fn().mockReturnValue({ json, send: jest.fn() }),
    };
    const call = (handler: unknown, method: string, body?: unknown) =>
      (handler as (req: Request, res: Response) => Promise<void>)(
        { method, body, headers: {}, ip: '127.0.0.1' } as unknown as Request,
        res as unknown as Response
      );

    await call(functions.activate, 'POST', { activation_code: code });
    expect(json).toHaveBeenLastCalledWith({ success: true });

    await call(functions.getState, 'GET');
    expect(json).toHaveBeenLastCalledWith({
      success: true,
      state: 'ACTIVE',
      activation_code: code,
      expires: null,
    });

    await call(functions.deactivate, 'POST');
    await call(functions.getState, 'GET');
    expect(json).toHaveBeenLastCalledWith({
      success: true,
      state: 'NONE',
      activation_code: '',
      expires: null,
    });
  });
});
