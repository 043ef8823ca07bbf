import axios, { type AxiosInstance } from 'axios';
import type { IResolvedExtension } from '@enfyra/types';
import { ExtensionRuntimeError } from './errors.js';

interface RuntimeResponse {
    success: boolean;
    extension?: IResolvedExtension;
}

/**
 * Source of resolved extensions. {@link ExtensionClient} is the HTTP
 * implementation; hosts with their own transport can supply another.
 */
export interface IExtensionSource {
    fetchPage(path: string): Promise<IResolvedExtension | null>;
    fetchWidget(id: number): Promise<IResolvedExtension | null>;
}

export interface IExtensionClientOptions {
    /**
     * Back end origin, e.g. `http://localhost:1105`.
     */
    baseURL?: string;
    timeout?: number;

    /**
     * Preconfigured axios instance; `baseURL` and `timeout` are ignored when set.
     */
    http?: AxiosInstance;
}

/**
 * Reads the public runtime endpoints of the back end.
 */
export class ExtensionClient implements IExtensionSource {
    private readonly http: AxiosInstance;

    constructor(options: IExtensionClientOptions = {}) {
        this.http =
            options.http ??
            axios.create({
                baseURL: options.baseURL,
                timeout: options.timeout ?? 5000
            });
    }

    /**
     * @returns The page extension linked to the menu at `path`, or null when nothing renders there
     */
    async fetchPage(path: string): Promise<IResolvedExtension | null> {
        return this.request('/api/runtime/pages', { path });
    }

    /**
     * @returns The enabled widget with that id, or null
     */
    async fetchWidget(id: number): Promise<IResolvedExtension | null> {
        return this.request(`/api/runtime/widgets/${id}`);
    }

    private async request(url: string, params?: Record<string, string>): Promise<IResolvedExtension | null> {
        let status: number;
        // A body of JSON `null` parses to null
        let body: RuntimeResponse | null;
        try {
            // Status handling happens below so a 404 is not raised as an error
            const response = await this.http.get<RuntimeResponse | null>(url, { params, validateStatus: () => true });
            status = response.status;
            body = response.data;
        } catch (error) {
            throw new ExtensionRuntimeError(`Request to ${url} failed`, null, { cause: error });
        }

        if (status === 404) {
            return null;
        }
        if (status < 200 || status >= 300) {
            throw new ExtensionRuntimeError(`Request to ${url} failed with status ${status}`);
        }
        if (!body?.success || !body.extension) {
            throw new ExtensionRuntimeError(`Unexpected response from ${url}`);
        }
        return body.extension;
    }
}
