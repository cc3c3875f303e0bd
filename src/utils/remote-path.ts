import { AnchorNotFoundError } from "@utils/errors.js";

export type RetType<T> =
    { stat: true, data: T } |
    { stat: false, msg: string }

function trimSlashes(part: string): string {
    return part.replace(/^\/+|\/+$/g, "");
}

function trimTrailingSlashes(part: string): string {
    return part.replace(/\/+$/, "");
}

// join remote url segments, e.g. ("https://host/", "/data", "a.txt") => "https://host/data/a.txt"
export function joinRemote(...parts: string[]): string {
    return parts
        .filter(part => part)
        .map(trimSlashes)
        .join("/");
}

/**
 * Percent-decode a remote path. Escape sequences that do not form valid UTF-8
 * are kept as they are.
 */
export function decodePath(value: string): string {
    return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, sequence => {
        try {
            return decodeURIComponent(sequence);
        } catch {
            return sequence;
        }
    });
}

// last segment of an href, "/data/sub/" => "sub"
export function hrefBasename(href: string): string {
    const trimmed = trimTrailingSlashes(href);
    return trimmed.slice(trimmed.lastIndexOf("/") + 1);
}

/**
 * Everything after the first occurrence of `/{baseName}/` in `path`.
 *
 * @example
 * matchBasePrefix("https://host.org/data/example1", "data") // { stat: true, data: "example1" }
 */
export function matchBasePrefix(path: string, baseName: string): RetType<string> {
    const search = "/" + baseName + "/";
    const index = path.indexOf(search);
    if (index === -1) {
        return {
            stat: false,
            msg: `${search} not found in ${path}`
        };
    }
    return {
        stat: true,
        data: path.slice(index + search.length)
    };
}

// like matchBasePrefix, but falls back to the unchanged path when the base is absent
export function stripBasePrefix(path: string, baseName: string): string {
    const matched = matchBasePrefix(path, baseName);
    return matched.stat ? matched.data : path;
}

// whether the raw path starts with the raw anchor as a whole segment
export function startsWithAnchor(fullPath: string, anchor: string): boolean {
    const bareAnchor = trimTrailingSlashes(anchor);
    return bareAnchor !== "" && fullPath.startsWith(bareAnchor + "/");
}

/**
 * The part of `fullPath` that follows `anchor`.
 *
 * Hrefs and anchors do not always agree on percent-encoding, so the match is
 * done on decoded values. When the raw path already starts with the raw
 * anchor, the remainder is returned with its original encoding.
 *
 * @example
 * subPath("/data/subfolder1/text.txt", "data") // "subfolder1/text.txt"
 * subPath("data", "data") // ""
 * @throws AnchorNotFoundError when the decoded anchor does not occur in the decoded path
 */
export function subPath(fullPath: string, anchor: string): string {
    const decodedFullPath = decodePath(fullPath);
    const decodedAnchor = trimTrailingSlashes(decodePath(anchor)) + "/";
    const decodedBareAnchor = decodedAnchor.slice(0, -1);

    // the anchor is the target itself
    const target = trimTrailingSlashes(decodedFullPath);
    if (target === decodedBareAnchor || target === "/" + decodedBareAnchor) {
        return "";
    }

    if (!decodedFullPath.includes(decodedAnchor)) {
        throw new AnchorNotFoundError(fullPath, anchor);
    }

    if (startsWithAnchor(fullPath, anchor)) {
        return fullPath.slice(trimTrailingSlashes(anchor).length + 1);
    }

    // prefer an occurrence that starts a path segment
    const boundaryIndex = decodedFullPath.indexOf("/" + decodedAnchor);
    const start = boundaryIndex !== -1
        ? boundaryIndex + 1 + decodedAnchor.length
        : decodedFullPath.indexOf(decodedAnchor) + decodedAnchor.length;
    return decodedFullPath.slice(start);
}
