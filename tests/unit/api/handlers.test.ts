/**
 * @fileoverview Unit tests for the entitlement endpoints
 * @module tests/unit/api/handlers.test
 *
 * @description
 * Handlers are exercised directly with mock request/response objects and a
 * real EntitlementService behind a fake validator.
 */

import { Request, Response } from 'express';
import { createActivateHandler, parseActivateBody } from '../../../src/api/enterprise/activate';
import { createDeactivateHandler } from '../../../src/api/enterprise/deactivate';
import { createGetStateHandler } from '../../../src/api/enterprise/getState';
import { getClientIP } from '../../../src/middleware/request';
import { EntitlementService } from '../../../src/services/entitlementService';
import { ActivationCodeValidationResult } from '../../../src/services/activationCode';

jest.mock('firebase-functions/logger', () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}));

type MockRequest = {
  method: string;
  body: unknown;
  headers: Record<string, string>;
  ip: string;
  socket: { remoteAddress: string };
};

type MockResponse = {
  status: jest.Mock;
  json: jest.Mock;
  setHeader: jest.Mock;
  send: jest.Mock;
};

type Handler = (req: Request, res: Response) => Promise<void>;

const NOW = new Date('2026-10-19T10:00:00.000Z');

function fakeValidate(code: string): ActivationCodeValidationResult {
  if (code.startsWith('valid-')) {
    return { valid: true, activation: { code, customerId: 'customer_test', features: [] } };
  }
  return { valid: false, error: 'Activation code signature is invalid', code: 'INVALID_CODE' };
}

describe('Entitlement endpoints', () => {
  let mockRequest: MockRequest;
  let mockResponse: MockResponse;
  let mockJson: jest.Mock;
  let mockStatus: jest.Mock;
  let mockSetHeader: jest.Mock;
  let mockSend: jest.Mock;
  let service: EntitlementService;

  const invoke = async (handler: Handler, method: string, body?: unknown): Promise<void> => {
    mockRequest.method = method;
    mockRequest.body = body;
    await handler(mockRequest as unknown as Request, mockResponse as unknown as Response);
  };

  beforeEach(() => {
    mockJson = jest.fn().mockReturnThis();
    mockSend = jest.fn().mockReturnThis();
    mockSetHeader = jest.fn().mockReturnThis();
    mockStatus = jest.fn().mockReturnValue({ json: mockJson, send: mockSend });

    mockRequest = {
      method: 'POST',
      body: {},
      headers: {},
      ip: '127.0.0.1',
      socket: { remoteAddress: '127.0.0.1' },
    };

    mockResponse = {
      status: mockStatus,
      json: mockJson,
      setHeader: mockSetHeader,
      send: mockSend,
    };

    service = new EntitlementService({ validator: fakeValidate, now: () => NOW });
  });

  describe('request prelude', () => {
    it('should answer preflight requests with 204', async () => {
      await invoke(createActivateHandler(service), 'OPTIONS');

      expect(mockStatus).toHaveBeenCalledWith(204);
      expect(mockSend).toHaveBeenCalledWith('');
      expect(mockSetHeader).toHaveBeenCalledWith('Access-Control-Allow-Origin', '*');
      expect(mockSetHeader).toHaveBeenCalledWith('Access-Control-Allow-Methods', 'POST, OPTIONS');
    });

    it('should tag every response with a request ID', async () => {
      await invoke(createGetStateHandler(service), 'GET');

      expect(mockSetHeader).toHaveBeenCalledWith(
        'X-Request-ID',
        expect.stringMatching(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
      );
    });

    it('should return 405 for wrong methods on activate', async () => {
      await invoke(createActivateHandler(service), 'GET');

      expect(mockStatus).toHaveBeenCalledWith(405);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'Method not allowed. Use POST',
        code: 'INVALID_METHOD',
      });
    });

    it('should list both methods for getState', async () => {
      await invoke(createGetStateHandler(service), 'PUT');

      expect(mockStatus).toHaveBeenCalledWith(405);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'Method not allowed. Use GET or POST',
        code: 'INVALID_METHOD',
      });
    });

    it('should take the first forwarded address as the client IP', () => {
      mockRequest.headers['x-forwarded-for'] = '203.0.113.7, 10.0.0.1';

      expect(getClientIP(mockRequest as unknown as Request)).toBe('203.0.113.7');
    });
  });

  describe('POST /activate', () => {
    it('should return 400 when the body is missing', async () => {
      await invoke(createActivateHandler(service), 'POST', undefined);

      expect(mockStatus).toHaveBeenCalledWith(400);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'Request body is required',
        code: 'MISSING_FIELDS',
      });
    });

    it('should return 400 when activation_code is missing', async () => {
      await invoke(createActivateHandler(service), 'POST', { expires: null });

      expect(mockStatus).toHaveBeenCalledWith(400);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'activation_code is required',
        code: 'MISSING_FIELDS',
      });
    });

    it('should return 400 for an unparseable expiry', async () => {
      await invoke(createActivateHandler(service), 'POST', {
        activation_code: 'valid-1',
        expires: 'tomorrow',
      });

      expect(mockStatus).toHaveBeenCalledWith(400);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'expires is not a valid timestamp: tomorrow',
        code: 'INVALID_EXPIRY',
      });
    });

    it('should return 400 with the validation error for a bad code', async () => {
      await invoke(createActivateHandler(service), 'POST', { activation_code: 'forged' });

      expect(mockStatus).toHaveBeenCalledWith(400);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'Activation code signature is invalid',
        code: 'INVALID_CODE',
      });
      await expect(service.getState()).resolves.toEqual({ state: 'NONE' });
    });

    it('should return 200 and install the code', async () => {
      await invoke(createActivateHandler(service), 'POST', { activation_code: 'valid-1' });

      expect(mockStatus).toHaveBeenCalledWith(200);
      expect(mockJson).toHaveBeenCalledWith({ success: true });
      await expect(service.getState()).resolves.toEqual({
        state: 'ACTIVE',
        activationCode: 'valid-1',
        expiresAt: undefined,
      });
    });
  });

  describe('GET /getState', () => {
    it('should report NONE with an empty code and null expiry', async () => {
      await invoke(createGetStateHandler(service), 'GET');

      expect(mockStatus).toHaveBeenCalledWith(200);
      expect(mockJson).toHaveBeenCalledWith({
        success: true,
        state: 'NONE',
        activation_code: '',
        expires: null,
      });
    });

    it('should report EXPIRED with the expiry at whole-second precision', async () => {
      await invoke(createActivateHandler(service), 'POST', {
        activation_code: 'valid-2',
        expires: '2026-10-19T09:59:30.500Z',
      });
      mockJson.mockClear();

      await invoke(createGetStateHandler(service), 'POST');

      expect(mockJson).toHaveBeenCalledWith({
        success: true,
        state: 'EXPIRED',
        activation_code: 'valid-2',
        expires: '2026-10-19T09:59:30.000Z',
      });
    });

    it('should return 500 when the record breaks its invariants', async () => {
      service = new EntitlementService({
        validator: fakeValidate,
        now: () => NOW,
        initialRecord: { expiresAt: NOW },
      });

      await invoke(createGetStateHandler(service), 'GET');

      expect(mockStatus).toHaveBeenCalledWith(500);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'Entitlement record has an expiry but no activation code',
        code: 'STATE_INCONSISTENT',
      });
    });

    it('should hide unexpected errors behind INTERNAL_ERROR', async () => {
      const failing = {
        getState: jest.fn().mockRejectedValue(new Error('clock unavailable')),
      } as unknown as EntitlementService;

      await invoke(createGetStateHandler(failing), 'GET');

      expect(mockStatus).toHaveBeenCalledWith(500);
      expect(mockJson).toHaveBeenCalledWith({
        success: false,
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
      });
    });
  });

  describe('POST /deactivate', () => {
    it('should return 200 and clear the record', async () => {
      await service.activate('valid-3');

      await invoke(createDeactivateHandler(service), 'POST');

      expect(mockStatus).toHaveBeenCalledWith(200);
      expect(mockJson).toHaveBeenCalledWith({ success: true });
      await expect(service.getState()).resolves.toEqual({ state: 'NONE' });
    });

    it('should return 200 when nothing is installed', async () => {
      await invoke(createDeactivateHandler(service), 'POST');
      await invoke(createDeactivateHandler(service), 'POST');

      expect(mockStatus).toHaveBeenNthCalledWith(1, 200);
      expect(mockStatus).toHaveBeenNthCalledWith(2, 200);
    });
  });
});

describe('parseActivateBody', () => {
  it('should trim the activation code', () => {
    expect(parseActivateBody({ activation_code: '  valid-1  ' })).toEqual({
      valid: true,
      data: { activationCode: 'valid-1' },
    });
  });

  it('should parse an ISO-8601 expiry', () => {
    expect(parseActivateBody({ activation_code: 'valid-1', expires: '2027-01-01T00:00:00Z' })).toEqual({
      valid: true,
      data: { activationCode: 'valid-1', expiresAt: new Date('2027-01-01T00:00:00.000Z') },
    });
  });

  it('should reject a non-string expiry', () => {
    expect(parseActivateBody({ activation_code: 'valid-1', expires: 1798761600 })).toEqual({
      valid: false,
      code: 'INVALID_EXPIRY',
      error: 'expires must be an ISO-8601 string',
    });
  });

  it('should reject a blank activation code', () => {
    expect(parseActivateBody({ activation_code: '   ' })).toEqual({
      valid: false,
      code: 'MISSING_FIELDS',
      error: 'activation_code is required',
    });
  });
});
