import path from "path";
import type { DavLister } from "@services/dav-lister.js";
import type { FileDownloader } from "@services/file-downloader.js";
import type { Logger } from "@utils/logger.js";

export type TreeDownloadSummary = {
    folders: number;
    downloaded: number;
    skipped: number;
    bytes: number;
}

/**
 * Mirrors a remote folder and all of its subfolders to local disk.
 *
 * Folders waiting to be processed are kept on an explicit stack instead of
 * the call stack. Siblings are therefore visited in reverse listing order.
 * Remote trees are assumed to be acyclic; there is no depth limit.
 */
export class TreeWalker {
    constructor(
        private readonly downloader: FileDownloader,
        private readonly lister: DavLister,
        private readonly logger: Logger
    ) { };

    public async downloadTree(remoteRoot: string, localBase: string): Promise<TreeDownloadSummary> {
        // every local path is computed relative to the folder the walk started from
        const globalAnchor = remoteRoot.replace(/^\/+|\/+$/g, "");
        const stack: string[] = [globalAnchor];
        const summary: TreeDownloadSummary = { folders: 0, downloaded: 0, skipped: 0, bytes: 0 };

        let current = stack.pop();
        while (current !== undefined) {
            this.logger.debug({ remoteFolder: current }, "processing folder");
            summary.folders++;

            const result = await this.downloader.downloadFolder(globalAnchor, current, localBase);
            summary.downloaded += result.downloaded.length;
            summary.skipped += result.skipped.length;
            summary.bytes += result.downloaded.reduce((acc, file) => acc + file.bytes, 0);

            const folders = await this.lister.listFolders(current);
            if (folders.length === 0) {
                this.logger.info({ remoteFolder: current }, "found no subfolders");
            }
            for (const folder of folders) {
                this.logger.info({ folder, remoteFolder: current }, "found subfolder");
                stack.push(path.posix.join(current, folder));
            }

            current = stack.pop();
        }

        this.logger.info(summary, "download finished");
        return summary;
    }
}
