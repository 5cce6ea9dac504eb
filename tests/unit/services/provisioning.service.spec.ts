/**
 * Hub Provisioning Service Unit Tests
 *
 * Idempotent get-or-create against the device registry and mapping of
 * registry failures onto the relay's error taxonomy.
 *
 * @module tests/unit/services/provisioning.service.spec
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockAxiosInstance = vi.hoisted(() => ({
  get: vi.fn(),
  put: vi.fn(),
  post: vi.fn(),
  interceptors: {
    response: {
      use: vi.fn(),
    },
  },
}));

// Mock axios with internal instance
vi.mock('axios', () => {
  const mockIsAxiosError = (error: unknown) => {
    return typeof error === 'object' && error !== null && 'isAxiosError' in error;
  };
  return {
    default: {
      create: vi.fn(() => mockAxiosInstance),
      isAxiosError: mockIsAxiosError,
    },
    isAxiosError: mockIsAxiosError,
  };
});

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import axios from 'axios';
import { HubProvisioningService } from '../../../src/services/provisioning.service';
import { InvalidCodeError, ProvisioningUnavailableError } from '../../../src/utils/errors';

const DEVICE_ID = '4006381333931';
const CONNECTION_STRING = `HostName=hub.example.test;DeviceId=${DEVICE_ID};SharedAccessKey=dGVzdC1zZWNyZXQ=`;

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    code: status >= 500 ? 'ERR_BAD_RESPONSE' : 'ERR_BAD_REQUEST',
    response: { status },
  });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected rejection');
}

describe('HubProvisioningService', () => {
  let service: HubProvisioningService;

  beforeEach(() => {
    vi.clearAllMocks();
    mockAxiosInstance.get.mockReset();
    mockAxiosInstance.put.mockReset();
    service = new HubProvisioningService({
      endpoint: 'https://registry.example.test',
      apiKey: 'test-secret',
      timeoutMs: 10_000,
    });
  });

  it('should configure the client with the raw registry key', () => {
    expect(vi.mocked(axios.create)).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'https://registry.example.test',
        timeout: 10_000,
        headers: expect.objectContaining({ Authorization: 'test-secret' }),
      })
    );
  });

  it('should return an existing device without creating it', async () => {
    mockAxiosInstance.get.mockResolvedValueOnce({
      status: 200,
      data: { deviceId: DEVICE_ID, connectionString: CONNECTION_STRING },
    });

    const identity = await service.provisionOrFetchIdentity(DEVICE_ID);

    expect(identity).toEqual({ identityId: DEVICE_ID, credential: CONNECTION_STRING, enabled: true, created: false });
    expect(mockAxiosInstance.get).toHaveBeenCalledWith(`/devices/${DEVICE_ID}`, expect.any(Object));
    expect(mockAxiosInstance.put).not.toHaveBeenCalled();
  });

  it('should create the device when the registry does not know it', async () => {
    mockAxiosInstance.get.mockResolvedValueOnce({ status: 404, data: {} });
    mockAxiosInstance.put.mockResolvedValueOnce({
      status: 201,
      data: { deviceId: DEVICE_ID, connectionString: CONNECTION_STRING, status: 'enabled' },
    });

    const identity = await service.provisionOrFetchIdentity(DEVICE_ID);

    expect(identity.created).toBe(true);
    expect(mockAxiosInstance.put).toHaveBeenCalledWith(
      `/devices/${DEVICE_ID}`,
      { deviceId: DEVICE_ID },
      expect.any(Object)
    );
  });

  it('should fetch again when creation races another relay', async () => {
    mockAxiosInstance.get
      .mockResolvedValueOnce({ status: 404, data: {} })
      .mockResolvedValueOnce({ status: 200, data: { deviceId: DEVICE_ID, connectionString: CONNECTION_STRING } });
    mockAxiosInstance.put.mockResolvedValueOnce({ status: 409, data: {} });

    const identity = await service.provisionOrFetchIdentity(DEVICE_ID);

    expect(identity.created).toBe(false);
    expect(mockAxiosInstance.get).toHaveBeenCalledTimes(2);
  });

  it('should report a disabled device', async () => {
    mockAxiosInstance.get.mockResolvedValueOnce({
      status: 200,
      data: { deviceId: DEVICE_ID, connectionString: CONNECTION_STRING, status: 'disabled' },
    });

    const identity = await service.provisionOrFetchIdentity(DEVICE_ID);

    expect(identity.enabled).toBe(false);
  });

  it('should encode the identity in the path', async () => {
    mockAxiosInstance.get.mockResolvedValueOnce({
      status: 200,
      data: { deviceId: 'lot:4711', connectionString: CONNECTION_STRING },
    });

    await service.provisionOrFetchIdentity('lot:4711');

    expect(mockAxiosInstance.get).toHaveBeenCalledWith('/devices/lot%3A4711', expect.any(Object));
  });

  it('should reject a record for a different device', async () => {
    mockAxiosInstance.get.mockResolvedValueOnce({
      status: 200,
      data: { deviceId: 'someone-else', connectionString: CONNECTION_STRING },
    });

    const error = await captureError(service.provisionOrFetchIdentity(DEVICE_ID));

    expect(error).toBeInstanceOf(ProvisioningUnavailableError);
    expect(error).toHaveProperty('message', `Registry returned device someone-else for ${DEVICE_ID}`);
  });

  it('should reject a malformed record', async () => {
    mockAxiosInstance.get.mockResolvedValueOnce({ status: 200, data: { deviceId: DEVICE_ID } });

    const error = await captureError(service.provisionOrFetchIdentity(DEVICE_ID));

    expect(error).toBeInstanceOf(ProvisioningUnavailableError);
    expect(error).toHaveProperty('message', 'Registry returned an invalid device record');
  });

  it('should treat server errors as unavailable', async () => {
    mockAxiosInstance.get.mockRejectedValueOnce(httpError(503));

    const error = await captureError(service.provisionOrFetchIdentity(DEVICE_ID));

    expect(error).toBeInstanceOf(ProvisioningUnavailableError);
    expect(error).toHaveProperty('message', 'Provisioning unavailable: Request failed with status code 503');
    expect(error).toHaveProperty('httpStatus', 503);
  });

  it('should treat network failures as unavailable', async () => {
    mockAxiosInstance.get.mockRejectedValueOnce(
      Object.assign(new Error('connect ECONNREFUSED 10.0.0.1:443'), { isAxiosError: true, code: 'ECONNREFUSED' })
    );

    const error = await captureError(service.provisionOrFetchIdentity(DEVICE_ID));

    expect(error).toBeInstanceOf(ProvisioningUnavailableError);
  });

  it('should treat a rejected id as an invalid code', async () => {
    mockAxiosInstance.get.mockResolvedValueOnce({ status: 404, data: {} });
    mockAxiosInstance.put.mockRejectedValueOnce(httpError(400));

    const error = await captureError(service.provisionOrFetchIdentity(DEVICE_ID));

    expect(error).toBeInstanceOf(InvalidCodeError);
    expect(error).toHaveProperty('message', 'Registry rejected identity (HTTP 400)');
  });

  it('should not blame the code for an auth failure', async () => {
    mockAxiosInstance.get.mockRejectedValueOnce(httpError(401));

    const error = await captureError(service.provisionOrFetchIdentity(DEVICE_ID));

    expect(error).toBeInstanceOf(ProvisioningUnavailableError);
    expect(error).toHaveProperty('httpStatus', 401);
  });
});
