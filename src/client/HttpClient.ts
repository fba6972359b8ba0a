/**
 * HTTP Client
 * Axios wrapper for the QuickBooks data API with bearer authentication
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';

export type AccessTokenProvider = (signal?: AbortSignal) => Promise<string>;

export interface HttpClientConfig {
    baseUrl: string;
    getAccessToken: AccessTokenProvider;
    timeout?: number;
    /** Transport override; axios picks its own when unset */
    adapter?: AxiosAdapter;
}

export class HttpClient {
    private readonly client: AxiosInstance;
    private readonly getAccessToken: AccessTokenProvider;

    constructor(config: HttpClientConfig) {
        this.getAccessToken = config.getAccessToken;

        this.client = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeout || 30000,
            adapter: config.adapter,
            headers: {
                'Accept': 'application/json',
            },
        });

        // Add auth interceptor; an explicit Authorization header is kept as is
        this.client.interceptors.request.use(async (requestConfig) => {
            if (!requestConfig.headers.Authorization) {
                const signal = requestConfig.signal instanceof AbortSignal ? requestConfig.signal : undefined;
                const accessToken = await this.getAccessToken(signal);
                requestConfig.headers.Authorization = `Bearer ${accessToken}`;
            }
            return requestConfig;
        });
    }

    get baseUrl(): string {
        return this.client.defaults.baseURL ?? '';
    }

    async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
        const response: AxiosResponse<T> = await this.client.get(url, config);
        return response.data;
    }
}
