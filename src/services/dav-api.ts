import { createClient, WebDAVClient } from "webdav";

export type DavCredential = {
    username: string;
    password: string;
}

// a saved login: where to connect and as whom
export type DavProfile = DavCredential & {
    hostname: string;
}

export type DavEndpoint = Readonly<{
    hostname: string;
    auth: Readonly<DavCredential>;
}>

export function createDavEndpoint(profile: DavProfile): DavEndpoint {
    return Object.freeze({
        hostname: profile.hostname,
        auth: Object.freeze({
            username: profile.username,
            password: profile.password
        })
    });
}

export function createDavClient(endpoint: DavEndpoint): WebDAVClient {
    return createClient(endpoint.hostname, {
        username: endpoint.auth.username,
        password: endpoint.auth.password
    });
}

// check the credentials by asking the server whether the given folder exists
export async function verifyEndpoint(endpoint: DavEndpoint, remotePath: string = "/"): Promise<boolean> {
    return await createDavClient(endpoint).exists(remotePath);
}
