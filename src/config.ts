import path from "path";
import { homedir } from "os";
import type { DavProfile } from "@services/dav-api.js";
import type { RetType } from "@utils/remote-path.js";

// every PROPFIND and GET gives up after this long
export const REQUEST_TIMEOUT_MS = 30_000;

// size of the chunks a download is written in
export const WRITE_CHUNK_SIZE = 8 * 1024;

export const PROFILE_DIR = path.join(homedir(), ".davmirror");

export const DEFAULT_LOG_FILE = path.join("logs", "davmirror.log");

export type ConnectionOptions = {
    hostname?: string;
    username?: string;
    password?: string;
};

// a profile that may still lack its password, which is then asked for
export type PartialProfile = Omit<DavProfile, "password"> & { password?: string };

/**
 * Merge connection settings given on the command line over a saved profile.
 */
export function resolveConnection(options: ConnectionOptions, saved: DavProfile | undefined): RetType<PartialProfile> {
    const hostname = options.hostname ?? saved?.hostname;
    const username = options.username ?? saved?.username;

    if (!hostname) {
        return {
            stat: false,
            msg: "no hostname given and no saved profile found, run `davmirror login` or pass --hostname"
        };
    }
    if (!username) {
        return {
            stat: false,
            msg: "no username given and no saved profile found, run `davmirror login` or pass --username"
        };
    }

    // a password saved for another user or host must not leak into this connection
    const sameAccount = saved !== undefined && saved.hostname === hostname && saved.username === username;

    return {
        stat: true,
        data: {
            hostname,
            username,
            password: options.password ?? (sameAccount ? saved.password : undefined)
        }
    };
}
