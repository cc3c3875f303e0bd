import fs from "fs";
import path from "path";
import type { DavEndpoint } from "@services/dav-api.js";
import type { DavLister } from "@services/dav-lister.js";
import type { DavTransport, DownloadResponse } from "@services/dav-transport.js";
import { writeStreamToFile } from "@utils/downloader.js";
import { errorMessage, isFileSystemError } from "@utils/errors.js";
import type { Logger } from "@utils/logger.js";
import { decodePath, hrefBasename, joinRemote, matchBasePrefix, startsWithAnchor, subPath } from "@utils/remote-path.js";

export type DownloadedFile = {
    remoteUrl: string;
    localPath: string;
    bytes: number;
}

export type SkippedFile = {
    remoteUrl: string;
    reason: string;
}

export type FolderDownloadResult = {
    downloaded: DownloadedFile[];
    skipped: SkippedFile[];
}

export type DownloadEvent =
    { type: "downloaded" } & DownloadedFile |
    { type: "skipped" } & SkippedFile

export type FileDownloaderOptions = {
    // called once per file, after it was written or skipped
    onEvent?: (event: DownloadEvent) => void;
    // called for every chunk written
    onProgress?: (remoteUrl: string, transferred: number) => void;
}

type FileTarget = {
    remoteUrl: string;
    localPath: string;
}

// downloads the files directly below one remote folder
export class FileDownloader {
    constructor(
        private readonly endpoint: DavEndpoint,
        private readonly lister: DavLister,
        private readonly transport: DavTransport,
        private readonly logger: Logger,
        private readonly options: FileDownloaderOptions = {}
    ) { };

    /**
     * Work out where a listed file comes from and where it goes.
     *
     * @param href raw href as listed by the server
     * @param globalAnchor remote folder the whole download started from
     * @param remoteFolder remote folder currently being downloaded, relative to the hostname
     * @param localBase local folder that mirrors `globalAnchor`
     */
    public resolveTarget(href: string, globalAnchor: string, remoteFolder: string, localBase: string): FileTarget {
        const matched = matchBasePrefix(href, remoteFolder);
        let remoteUrl: string;
        let decodedName: string;
        if (matched.stat) {
            remoteUrl = joinRemote(this.endpoint.hostname, remoteFolder, matched.data);
            decodedName = decodePath(matched.data);
        } else {
            this.logger.warn({ href, remoteFolder }, "remote folder not found in href, using the href as is");
            remoteUrl = new URL(href, this.endpoint.hostname).toString();
            decodedName = decodePath(hrefBasename(href));
        }

        // the folder chain is built from the href relative to the hostname
        const hrefPath = this.relativeToHost(href);
        const chain = subPath(hrefPath, globalAnchor);
        // subPath keeps the href encoding when the raw href starts with the anchor
        let folderChain = startsWithAnchor(hrefPath, globalAnchor) ? decodePath(chain) : chain;
        if (folderChain.endsWith(decodedName)) {
            folderChain = folderChain.slice(0, folderChain.length - decodedName.length);
        }
        this.logger.debug({ href, folderChain, decodedName }, "resolved local location");

        return {
            remoteUrl,
            localPath: path.join(localBase, folderChain, decodedName)
        };
    }

    // "/remote.php/webdav/data/a.txt" => "/data/a.txt" for a hostname ending in /remote.php/webdav
    private relativeToHost(href: string): string {
        const basePath = new URL(this.endpoint.hostname).pathname.replace(/\/+$/, "");
        if (basePath && href.startsWith(basePath + "/")) {
            return href.slice(basePath.length);
        }
        return href;
    }

    /**
     * Download every file directly below `remoteFolder` into the matching
     * place below `localBase`. A file the server refuses or that fails on the
     * network is logged and skipped; local filesystem errors are thrown.
     */
    public async downloadFolder(globalAnchor: string, remoteFolder: string, localBase: string): Promise<FolderDownloadResult> {
        if (!fs.existsSync(localBase)) {
            this.logger.info({ localBase }, "creating local folder");
        }
        await fs.promises.mkdir(localBase, { recursive: true });

        const result: FolderDownloadResult = { downloaded: [], skipped: [] };

        const files = await this.lister.listFiles(joinRemote(this.endpoint.hostname, remoteFolder));
        if (files.length === 0) {
            this.logger.info({ remoteFolder }, "found no files");
            return result;
        }

        for (const href of files) {
            const target = this.resolveTarget(href, globalAnchor, remoteFolder, localBase);
            const outcome = await this.downloadFile(target);
            if (outcome.type === "downloaded") {
                result.downloaded.push({ remoteUrl: outcome.remoteUrl, localPath: outcome.localPath, bytes: outcome.bytes });
            } else {
                result.skipped.push({ remoteUrl: outcome.remoteUrl, reason: outcome.reason });
            }
            this.options.onEvent?.(outcome);
        }

        return result;
    }

    private async downloadFile(target: FileTarget): Promise<DownloadEvent> {
        const { remoteUrl, localPath } = target;
        const skip = (reason: string): DownloadEvent => {
            this.logger.error({ url: remoteUrl, reason }, "failed to download file");
            return { type: "skipped", remoteUrl, reason };
        };

        let response: DownloadResponse;
        try {
            response = await this.transport.get(remoteUrl);
        } catch (error) {
            return skip(errorMessage(error));
        }
        if (response.statusCode !== 200) {
            response.body.destroy();
            return skip(`HTTP ${response.statusCode}`);
        }

        try {
            await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
            const onProgress = this.options.onProgress;
            const bytes = await writeStreamToFile(
                response.body,
                localPath,
                onProgress && (transferred => onProgress(remoteUrl, transferred))
            );
            this.logger.info({ url: remoteUrl, localPath, bytes }, "downloaded file");
            return { type: "downloaded", remoteUrl, localPath, bytes };
        } catch (error) {
            response.body.destroy();
            // a broken connection only costs this file, an unusable destination ends the walk
            if (isFileSystemError(error)) throw error;
            return skip(errorMessage(error));
        }
    }
}
