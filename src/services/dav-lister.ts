import type { DavEndpoint } from "@services/dav-api.js";
import type { DavTransport } from "@services/dav-transport.js";
import { RemoteListError } from "@utils/errors.js";
import type { Logger } from "@utils/logger.js";
import { parseMultistatusHrefs } from "@utils/multistatus.js";
import { decodePath, hrefBasename, joinRemote } from "@utils/remote-path.js";

export type DavEntry = {
    href: string;
    type: "file" | "folder";
}

// lists the direct children of remote folders, one PROPFIND per call
export class DavLister {
    constructor(
        private readonly endpoint: DavEndpoint,
        private readonly transport: DavTransport,
        private readonly logger: Logger
    ) { };

    // every entry of the multistatus answer for url, the folder itself included
    public async listEntries(url: string): Promise<DavEntry[]> {
        const response = await this.transport.propfind(url);
        if (response.statusCode !== 207) {
            this.logger.error({ url, statusCode: response.statusCode }, "failed to list directory contents");
            throw new RemoteListError(response.statusCode, url);
        }

        return parseMultistatusHrefs(response.body).map((href): DavEntry => ({
            href,
            type: href.endsWith("/") ? "folder" : "file"
        }));
    }

    /**
     * Raw hrefs of the files directly below `url`. Subfolders are not
     * descended into.
     */
    public async listFiles(url: string): Promise<string[]> {
        const entries = await this.listEntries(url);
        const files: string[] = [];
        for (const entry of entries) {
            if (entry.type !== "file") continue;
            this.logger.debug({ href: entry.href, url }, "found file");
            files.push(entry.href);
        }
        return files;
    }

    /**
     * Names of the folders directly below `parentPath`, in the order the
     * server reported them. The folder itself and hidden folders are left out.
     */
    public async listFolders(parentPath: string): Promise<string[]> {
        const url = joinRemote(this.endpoint.hostname, parentPath);
        const entries = await this.listEntries(url);
        const self = new URL(url + "/").href;
        const parentName = decodePath(hrefBasename(parentPath));

        const folders: string[] = [];
        for (const entry of entries) {
            if (entry.type !== "folder") continue;

            const folder = hrefBasename(entry.href);
            // servers echo the queried folder as its own first child
            const isParent = new URL(entry.href, self).href === self || decodePath(folder) === parentName;
            if (isParent || !folder || folder.startsWith(".")) continue;

            this.logger.debug({ folder, parentPath }, "found folder");
            folders.push(folder);
        }
        return folders;
    }
}
