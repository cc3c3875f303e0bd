import { Readable } from "stream";
import type { DavTransport, DownloadResponse, PropfindResponse } from "@services/dav-transport.js";

export type FakeRequest = {
    method: "PROPFIND" | "GET";
    url: string;
}

// "a b/c.txt" => "a%20b/c.txt"
const encodePath = (decoded: string) => decoded.split("/").map(encodeURIComponent).join("/");

/**
 * In-memory WebDAV server. Keys of the tree are decoded paths relative to the
 * hostname; keys ending in "/" are (empty) folders, the others files with
 * their content. Parent folders are created implicitly.
 */
export class FakeDavTransport implements DavTransport {
    public readonly requests: FakeRequest[] = [];
    // decoded path => content, or null for a folder
    private readonly entries = new Map<string, Buffer | null>();
    private readonly failures = new Map<string, number>();
    private readonly hrefBase: string;

    constructor(private readonly hostname: string, tree: Record<string, string | null>) {
        this.hrefBase = new URL(hostname).pathname.replace(/\/+$/, "");
        for (const [key, content] of Object.entries(tree)) {
            const isFolder = key.endsWith("/");
            const entryPath = key.replace(/\/+$/, "");
            this.addParents(entryPath);
            this.entries.set(entryPath, isFolder ? null : Buffer.from(content ?? ""));
        }
    }

    // answer every request for this decoded path with the given status
    public fail(method: FakeRequest["method"], decodedPath: string, statusCode: number) {
        this.failures.set(`${method} ${decodedPath}`, statusCode);
    }

    public setContent(decodedPath: string, content: string) {
        this.entries.set(decodedPath, Buffer.from(content));
    }

    public async propfind(url: string): Promise<PropfindResponse> {
        this.requests.push({ method: "PROPFIND", url });
        const folderPath = this.pathOf(url);

        const failure = folderPath !== undefined ? this.failures.get(`PROPFIND ${folderPath}`) : undefined;
        if (failure !== undefined) return { statusCode: failure, body: "" };
        if (folderPath === undefined || !this.isFolder(folderPath)) return { statusCode: 404, body: "" };

        const hrefs = [this.hrefOf(folderPath, true)];
        for (const [entryPath, content] of this.entries) {
            if (this.parentOf(entryPath) !== folderPath) continue;
            hrefs.push(this.hrefOf(entryPath, content === null));
        }

        const responses = hrefs.map(href =>
            `<d:response><d:href>${href}</d:href><d:propstat><d:prop><d:displayname/></d:prop>` +
            `<d:status>HTTP/1.1 200 OK</d:status></d:propstat></d:response>`
        );
        return {
            statusCode: 207,
            body: `<?xml version="1.0" encoding="utf-8"?>\n<d:multistatus xmlns:d="DAV:">${responses.join("")}</d:multistatus>`
        };
    }

    public async get(url: string): Promise<DownloadResponse> {
        this.requests.push({ method: "GET", url });
        const filePath = this.pathOf(url);

        const failure = filePath !== undefined ? this.failures.get(`GET ${filePath}`) : undefined;
        if (failure !== undefined) return { statusCode: failure, body: Readable.from([]) };

        const content = filePath !== undefined ? this.entries.get(filePath) : undefined;
        if (!content) return { statusCode: 404, body: Readable.from([]) };
        return { statusCode: 200, body: Readable.from([content]) };
    }

    private addParents(entryPath: string) {
        const parts = entryPath.split("/");
        for (let i = 1; i < parts.length; i++) {
            const parent = parts.slice(0, i).join("/");
            if (!this.entries.has(parent)) this.entries.set(parent, null);
        }
    }

    private isFolder(decodedPath: string): boolean {
        return decodedPath === "" || this.entries.get(decodedPath) === null;
    }

    private parentOf(decodedPath: string): string {
        const index = decodedPath.lastIndexOf("/");
        return index === -1 ? "" : decodedPath.slice(0, index);
    }

    private hrefOf(decodedPath: string, isFolder: boolean): string {
        const encoded = decodedPath ? "/" + encodePath(decodedPath) : "";
        return this.hrefBase + encoded + (isFolder ? "/" : "");
    }

    // decoded path relative to the hostname, undefined for foreign urls
    private pathOf(url: string): string | undefined {
        if (!url.startsWith(this.hostname)) return undefined;
        return decodeURIComponent(url.slice(this.hostname.length)).replace(/^\/+|\/+$/g, "");
    }
}
