import axios from 'axios';
import type { FetchOptions, TransportResult } from '../schedule/types.js';
import { errorMessage } from './errors.js';

const USER_AGENT = 'Mozilla/5.0 (compatible; RinkGuide/1.0)';

/**
 * GET a document as text. Timeouts, connection errors and non-2xx statuses
 * come back as a failed transport result.
 */
export async function fetchText(url: string, options: FetchOptions): Promise<TransportResult> {
    try {
        const response = await axios.get<string>(url, {
            params: options.params,
            timeout: options.timeoutMs,
            responseType: 'text',
            transformResponse: (data: unknown) => data,
            headers: { 'User-Agent': USER_AGENT },
        });
        if (typeof response.data !== 'string')
            return { ok: false, stage: 'transport', reason: 'response body is not text' };
        return { ok: true, body: response.data };
    } catch (error) {
        if (axios.isAxiosError(error)) {
            const reason = error.response
                ? `HTTP ${error.response.status}`
                : error.code === 'ECONNABORTED'
                    ? `timed out after ${options.timeoutMs}ms`
                    : error.message;
            return { ok: false, stage: 'transport', reason };
        }
        return { ok: false, stage: 'transport', reason: errorMessage(error) };
    }
}
