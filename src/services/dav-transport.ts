import axios, { AxiosInstance } from "axios";
import { Readable } from "stream";
import { REQUEST_TIMEOUT_MS } from "../config.js";
import type { DavEndpoint } from "@services/dav-api.js";

export type PropfindResponse = {
    statusCode: number;
    body: string;
}

export type DownloadResponse = {
    statusCode: number;
    body: Readable;
}

/**
 * The two requests a read-only mirror needs. Implementations resolve with
 * whatever status the server sent and reject only when no response arrived.
 */
export interface DavTransport {
    // depth 1 PROPFIND
    propfind(url: string): Promise<PropfindResponse>;
    // streamed GET
    get(url: string): Promise<DownloadResponse>;
}

export type AxiosDavTransportOptions = {
    timeout?: number;
    http?: AxiosInstance;
}

export class AxiosDavTransport implements DavTransport {
    private readonly http: AxiosInstance;
    private readonly timeout: number;

    constructor(
        private readonly endpoint: DavEndpoint,
        options: AxiosDavTransportOptions = {}
    ) {
        this.http = options.http ?? axios.create();
        this.timeout = options.timeout ?? REQUEST_TIMEOUT_MS;
    }

    public async propfind(url: string): Promise<PropfindResponse> {
        const response = await this.http.request<string>({
            method: "PROPFIND",
            url,
            headers: {
                "Content-Type": "application/xml",
                "Depth": "1"
            },
            auth: { ...this.endpoint.auth },
            timeout: this.timeout,
            responseType: "text",
            validateStatus: () => true
        });

        return {
            statusCode: response.status,
            body: typeof response.data === "string" ? response.data : String(response.data ?? "")
        };
    }

    public async get(url: string): Promise<DownloadResponse> {
        const response = await this.http.request<Readable>({
            method: "GET",
            url,
            auth: { ...this.endpoint.auth },
            timeout: this.timeout,
            responseType: "stream",
            validateStatus: () => true
        });

        return {
            statusCode: response.status,
            body: response.data
        };
    }
}
