import pino from "pino";
import { Readable } from "stream";
import { createDavEndpoint } from "@services/dav-api.js";
import { DavLister } from "@services/dav-lister.js";
import type { DavTransport, PropfindResponse } from "@services/dav-transport.js";
import { RemoteListError } from "@utils/errors.js";

const endpoint = createDavEndpoint({
    hostname: "http://localhost:8081",
    username: "testuser",
    password: "testpassword",
});

const multistatus = (...hrefs: string[]) =>
    `<d:multistatus xmlns:d="DAV:">${hrefs.map(href => `<d:response><d:href>${href}</d:href></d:response>`).join("")}</d:multistatus>`;

const createTransport = (response: PropfindResponse) => {
    const propfind = jest.fn(async (url: string) => response);
    const transport: DavTransport = {
        propfind,
        get: jest.fn(async () => ({ statusCode: 404, body: Readable.from([]) })),
    };
    return { transport, propfind };
};

const logger = pino({ level: "silent" });

describe("DavLister", () => {
    describe("listEntries", () => {
        it("tags entries by trailing slash", async () => {
            const { transport } = createTransport({ statusCode: 207, body: multistatus("/data/", "/data/a.txt") });
            const lister = new DavLister(endpoint, transport, logger);

            await expect(lister.listEntries("http://localhost:8081/data")).resolves.toEqual([
                { href: "/data/", type: "folder" },
                { href: "/data/a.txt", type: "file" },
            ]);
        });
    });

    describe("listFiles", () => {
        it("returns the hrefs without a trailing slash", async () => {
            const { transport, propfind } = createTransport({
                statusCode: 207,
                body: multistatus("/data/", "/data/Readme.md", "/data/subfolder1/", "/data/a%20b.txt"),
            });
            const lister = new DavLister(endpoint, transport, logger);

            const files = await lister.listFiles("http://localhost:8081/data");

            expect(files).toEqual(["/data/Readme.md", "/data/a%20b.txt"]);
            expect(propfind).toHaveBeenCalledWith("http://localhost:8081/data");
        });

        it("throws RemoteListError when the server does not answer 207", async () => {
            const { transport } = createTransport({ statusCode: 403, body: "" });
            const lister = new DavLister(endpoint, transport, logger);

            const listing = lister.listFiles("http://localhost:8081/data");

            await expect(listing).rejects.toBeInstanceOf(RemoteListError);
            await expect(listing).rejects.toMatchObject({ statusCode: 403, url: "http://localhost:8081/data" });
        });
    });

    describe("listFolders", () => {
        it("requests the folder below the hostname", async () => {
            const { transport, propfind } = createTransport({ statusCode: 207, body: multistatus("/data/sub/") });
            const lister = new DavLister(endpoint, transport, logger);

            await lister.listFolders("data/sub");

            expect(propfind).toHaveBeenCalledWith("http://localhost:8081/data/sub");
        });

        it("returns child folder names in server order", async () => {
            const { transport } = createTransport({
                statusCode: 207,
                body: multistatus("/data/", "/data/subfolder3/", "/data/Readme.md", "/data/subfolder1/", "/data/subfolder2/"),
            });
            const lister = new DavLister(endpoint, transport, logger);

            await expect(lister.listFolders("data")).resolves.toEqual(["subfolder3", "subfolder1", "subfolder2"]);
        });

        it("leaves out the folder itself when echoed as a full url", async () => {
            const { transport } = createTransport({
                statusCode: 207,
                body: multistatus("http://localhost:8081/data/", "http://localhost:8081/data/docs/"),
            });
            const lister = new DavLister(endpoint, transport, logger);

            await expect(lister.listFolders("data")).resolves.toEqual(["docs"]);
        });

        it("leaves out the folder itself when echoed below a base path", async () => {
            const nested = createDavEndpoint({
                hostname: "http://localhost:8081/remote.php/webdav",
                username: "testuser",
                password: "testpassword",
            });
            const { transport } = createTransport({
                statusCode: 207,
                body: multistatus("/remote.php/webdav/", "/remote.php/webdav/sub/"),
            });
            const lister = new DavLister(nested, transport, logger);

            await expect(lister.listFolders("")).resolves.toEqual(["sub"]);
        });

        it("leaves out the folder itself when its name is encoded", async () => {
            const { transport } = createTransport({
                statusCode: 207,
                body: multistatus("/my%20folder/", "/my%20folder/inner/", "/my%20folder/my%20folder/"),
            });
            const lister = new DavLister(endpoint, transport, logger);

            await expect(lister.listFolders("my folder")).resolves.toEqual(["inner"]);
        });

        it("leaves out hidden folders and folders named like the parent", async () => {
            const { transport } = createTransport({
                statusCode: 207,
                body: multistatus("/data/sub/", "/data/sub/.git/", "/data/sub/sub/", "/data/sub/my%20docs/"),
            });
            const lister = new DavLister(endpoint, transport, logger);

            await expect(lister.listFolders("data/sub")).resolves.toEqual(["my%20docs"]);
        });

        it("throws RemoteListError when the server does not answer 207", async () => {
            const { transport } = createTransport({ statusCode: 403, body: "" });
            const lister = new DavLister(endpoint, transport, logger);

            await expect(lister.listFolders("data")).rejects.toMatchObject({
                name: "RemoteListError",
                statusCode: 403,
            });
        });
    });
});
