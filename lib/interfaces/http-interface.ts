import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';

/**
 * HTTP access for fetching bootstrap install scripts
 */
export interface IHttpClient {
    request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}

const USER_AGENT = 'package-manager-updater';

/**
 * Default implementation on a dedicated axios instance
 */
export class AxiosHttpClient implements IHttpClient {
    private client: AxiosInstance;

    constructor(client?: AxiosInstance) {
        this.client = client || axios.create({
            headers: { 'User-Agent': USER_AGENT },
        });
    }

    async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        return this.client.request<T>(config);
    }
}
