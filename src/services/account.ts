/**
 * Account service for balance and usage reports.
 */

import { z } from 'zod';
import { ApiError } from '../errors';
import { HttpRequest, HttpTransport, requestJson } from '../transport';
import { BalanceResponse, DEFAULT_USAGE_DAYS, UsageReport } from '../types/account';

const jsonObjectSchema = z.record(z.unknown());

/**
 * Account service interface.
 */
export interface AccountService {
  /**
   * Gets the current balance for the API key.
   */
  getBalance(): Promise<BalanceResponse>;

  /**
   * Gets the usage report for the last `daysBack` days. The server accepts
   * 1 to 365; the value is sent unchecked.
   */
  getUsageReport(daysBack?: number): Promise<UsageReport>;
}

/**
 * Default account service implementation.
 */
export class DefaultAccountService implements AccountService {
  private readonly transport: HttpTransport;

  constructor(transport: HttpTransport) {
    this.transport = transport;
  }

  getBalance(): Promise<BalanceResponse> {
    return this.getObject({ method: 'GET', path: '/v1/balance' });
  }

  getUsageReport(daysBack: number = DEFAULT_USAGE_DAYS): Promise<UsageReport> {
    return this.getObject({
      method: 'GET',
      path: '/v1/report/usage',
      query: { days: daysBack },
    });
  }

  private async getObject(req: HttpRequest): Promise<Record<string, unknown>> {
    const { response, data } = await requestJson(this.transport, req);
    const result = jsonObjectSchema.safeParse(data);
    if (!result.success) {
      throw new ApiError(`Expected a JSON object from ${req.path}`, {
        statusCode: response.status,
        requestId: response.requestId,
      });
    }
    return result.data;
  }
}
