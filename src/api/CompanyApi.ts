/**
 * Company API
 * Company info lookup, used as the connectivity probe
 */

import type { HttpClient } from '../client/HttpClient.js';
import { cancelledError, errorMessage, isAbortError } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export interface CompanyInfo {
    Id: string;
    CompanyName: string;
    LegalName?: string;
    Country?: string;
}

/** Raw response shape from /v3/company/{realmId}/companyinfo/{realmId} */
interface CompanyInfoResponse {
    CompanyInfo?: CompanyInfo;
    time?: string;
}

export interface ProbeOptions {
    signal?: AbortSignal;
    /** Use this token instead of asking the token provider */
    accessToken?: string;
}

/**
 * What the connection lifecycle needs from the data API
 */
export interface RemoteDataApi {
    testConnectivity(options?: ProbeOptions): Promise<boolean>;
}

export class CompanyApi implements RemoteDataApi {
    constructor(
        private readonly http: HttpClient,
        private readonly getCompanyId: () => string | undefined
    ) { }

    async getCompanyInfo(options: ProbeOptions = {}): Promise<CompanyInfo> {
        const companyId = this.getCompanyId();
        if (!companyId) {
            throw new Error('QuickBooks company (realmId) is not set. Connect to QuickBooks first.');
        }

        const id = encodeURIComponent(companyId);
        const data = await this.http.get<CompanyInfoResponse>(`/v3/company/${id}/companyinfo/${id}`, {
            params: { minorversion: 75 },
            signal: options.signal,
            headers: options.accessToken ? { Authorization: `Bearer ${options.accessToken}` } : undefined,
        });

        if (!data.CompanyInfo) {
            throw new Error('QuickBooks returned no company info');
        }
        return data.CompanyInfo;
    }

    /**
     * False on any failure except cancellation, which is rethrown.
     */
    async testConnectivity(options: ProbeOptions = {}): Promise<boolean> {
        try {
            const info = await this.getCompanyInfo(options);
            log.debug(`QuickBooks connection test successful. Company: ${info.CompanyName}`);
            return true;
        } catch (error) {
            if (options.signal?.aborted || isAbortError(error)) {
                throw cancelledError('Connection test', error);
            }
            log.warn(`QuickBooks connection test failed: ${errorMessage(error)}`);
            return false;
        }
    }
}
