import axios, { AxiosInstance } from 'axios';
import { AuditConfig } from '../../config/audit.config';

/**
 * HTTP client for one audit run. The bearer token is opaque here; acquiring
 * it is the operator's job.
 */
export function createApiClient(config: Pick<AuditConfig, 'apiBaseUrl' | 'token' | 'requestTimeoutMs'>): AxiosInstance {
  return axios.create({
    baseURL: config.apiBaseUrl,
    timeout: config.requestTimeoutMs,
    headers: {
      Authorization: `Bearer ${config.token}`,
      'Content-Type': 'application/json',
      Accept: 'application/json'
    }
  });
}
