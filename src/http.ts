import axios, { type AxiosInstance } from 'axios';
import { CONFIG } from './config';

export interface HttpClientOptions {
    timeoutMs?: number;
    userAgent?: string;
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
    return axios.create({
        timeout: options.timeoutMs ?? CONFIG.REQUEST_TIMEOUT_MS,
        headers: {
            'User-Agent': options.userAgent ?? CONFIG.USER_AGENT,
        },
    });
}
