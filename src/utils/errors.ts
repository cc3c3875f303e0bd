// PROPFIND answered with something other than 207 Multi-Status
export class RemoteListError extends Error {
    constructor(
        public readonly statusCode: number,
        public readonly url: string
    ) {
        super(`Failed to list directory contents of ${url}: ${statusCode}`);
        this.name = "RemoteListError";
    }
}

// the anchor of a walk could not be located inside a remote path
export class AnchorNotFoundError extends Error {
    constructor(
        public readonly fullPath: string,
        public readonly anchor: string
    ) {
        super(`The path ${fullPath} does not contain the anchor ${anchor}`);
        this.name = "AnchorNotFoundError";
    }
}

// errors raised by fs carry the path they failed on, socket errors do not
export function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "path" in error && typeof error.path === "string";
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
