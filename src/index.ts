#!/usr/bin/env node

import fs from "fs";
import path from "path";
import { Command } from "commander";
import inquirer from "inquirer";
import { DEFAULT_LOG_FILE, resolveConnection, ConnectionOptions } from "./config.js";
import * as profileSaver from "@services/dav-auth-saver.js";
import { createDavEndpoint, verifyEndpoint, DavEndpoint, DavProfile } from "@services/dav-api.js";
import { AxiosDavTransport } from "@services/dav-transport.js";
import { DavLister } from "@services/dav-lister.js";
import { FileDownloader, DownloadEvent } from "@services/file-downloader.js";
import { TreeWalker } from "@services/tree-walker.js";
import { byteToSize } from "@utils/byte-to-size.js";
import { color } from "@utils/color-string.js";
import { errorMessage } from "@utils/errors.js";
import { createLogger, Logger } from "@utils/logger.js";
import { resolveLocalPath } from "@utils/path-resolver.js";
import { decodePath, hrefBasename, joinRemote } from "@utils/remote-path.js";
import { TableFormatter, Row } from "@utils/table-formatter.js";

type AccountOptions = ConnectionOptions & {
    account?: string;
}

type LoginOptions = AccountOptions & {
    default?: boolean;
}

type DownloadOptions = AccountOptions & {
    verbose?: boolean;
    logFile: string | false;
}

function readVersion(): string {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "../package.json"), "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
    }
    return "0.0.0";
}

async function askFor(name: string, message: string, secret: boolean): Promise<string> {
    if (secret) {
        const answers = await inquirer.prompt<Record<string, string>>([
            { type: "password", name, message, mask: "*" },
        ]);
        return answers[name];
    }
    const answers = await inquirer.prompt<Record<string, string>>([
        { type: "input", name, message },
    ]);
    return answers[name];
}

// options first, then the saved profile, then ask for the password
async function resolveEndpoint(options: AccountOptions): Promise<DavEndpoint> {
    const saved = profileSaver.getDavProfile(options.account);
    const connection = resolveConnection(options, saved);
    if (!connection.stat) {
        throw new Error(connection.msg);
    }
    const password = connection.data.password
        ?? await askFor("password", `Enter the password of ${connection.data.username}:`, true);
    return createDavEndpoint({ ...connection.data, password });
}

function reportError(error: unknown) {
    console.error(color(`Error: ${errorMessage(error)}`, "red"));
    process.exitCode = 1;
}

function buildServices(endpoint: DavEndpoint, logger: Logger, onEvent?: (event: DownloadEvent) => void) {
    const transport = new AxiosDavTransport(endpoint);
    const lister = new DavLister(endpoint, transport, logger);
    const showProgress = process.stdout.isTTY === true;
    const downloader = new FileDownloader(endpoint, lister, transport, logger, {
        onEvent,
        onProgress: showProgress
            ? (remoteUrl, transferred) => process.stdout.write(`\r\x1b[K${decodePath(hrefBasename(remoteUrl))} ${byteToSize(transferred)}`)
            : undefined,
    });
    const walker = new TreeWalker(downloader, lister, logger);
    return { lister, walker };
}

const program = new Command();

program
    .name("davmirror")
    .description("Download a remote WebDAV folder and all of its subfolders to local disk")
    .version(readVersion());

program
    .command("login")
    .option("-a, --account <account>", "name to save the profile under, defaults to the username")
    .option("-d, --default", "use this profile when no account is given")
    .option("-H, --hostname <url>", "WebDAV root url, e.g. https://example.org/remote.php/webdav")
    .option("-u, --username <username>", "WebDAV username")
    .description("verify WebDAV credentials and save them as a profile")
    .action(async (options: LoginOptions) => {
        try {
            const hostname = options.hostname ?? await askFor("hostname", "Enter the WebDAV url:", false);
            const username = options.username ?? await askFor("username", "Enter your WebDAV username:", false);
            const password = await askFor("password", "Enter your WebDAV password:", true);
            const profile: DavProfile = { hostname, username, password };

            console.log(`Logging in to ${hostname} as ${username}`);
            try {
                await verifyEndpoint(createDavEndpoint(profile));
            } catch (webdavError) {
                console.error(color(`WebDAV credentials verification failed: ${errorMessage(webdavError)}`, "red"));
                process.exitCode = 1;
                return;
            }

            const account = options.account ?? username;
            profileSaver.setDavProfile(account, profile);
            if (options.default || !profileSaver.getDavProfile(undefined)) {
                profileSaver.setDavProfile(undefined, profile);
            }
            console.log(color("Your WebDAV credentials have been saved.", "green"));
        } catch (error) {
            reportError(error);
        }
    });

program
    .command("logout")
    .option("-a, --account <account>", "profile to remove, defaults to the default profile")
    .description("remove a saved profile")
    .action((options: AccountOptions) => {
        try {
            const removed = profileSaver.deleteDavProfile(options.account);
            console.log(removed ? "Profile removed." : "No such profile.");
        } catch (error) {
            reportError(error);
        }
    });

program
    .command("ls")
    .argument("<remote>", "remote folder, relative to the WebDAV url")
    .option("-a, --account <account>", "saved profile to use")
    .option("-H, --hostname <url>", "WebDAV root url")
    .option("-u, --username <username>", "WebDAV username")
    .option("-p, --password <password>", "WebDAV password or app token")
    .description("list the files and folders directly below a remote folder")
    .action(async (remote: string, options: AccountOptions) => {
        try {
            const endpoint = await resolveEndpoint(options);
            const { lister } = buildServices(endpoint, createLogger());

            const folders = await lister.listFolders(remote);
            const files = await lister.listFiles(joinRemote(endpoint.hostname, remote));

            const formatter = new TableFormatter([
                { name: "name", width: 48 },
                { name: "type", width: 8 }
            ]);
            const rows: Row[] = [
                ...folders.map((folder): Row => ({
                    name: { value: decodePath(folder) + "/", color: "blue" },
                    type: { value: "folder" }
                })),
                ...files.map((href): Row => ({
                    name: { value: decodePath(hrefBasename(href)), color: "green" },
                    type: { value: "file" }
                }))
            ];
            console.log(formatter.formatTable(rows));
        } catch (error) {
            reportError(error);
        }
    });

program
    .command("download")
    .argument("<remote>", "remote folder, relative to the WebDAV url")
    .argument("<local>", "local folder that receives the files")
    .option("-a, --account <account>", "saved profile to use")
    .option("-H, --hostname <url>", "WebDAV root url")
    .option("-u, --username <username>", "WebDAV username")
    .option("-p, --password <password>", "WebDAV password or app token")
    .option("-v, --verbose", "log path resolution details")
    .option("--log-file <file>", "append log entries to this file", DEFAULT_LOG_FILE)
    .option("--no-log-file", "do not write a log file")
    .description("download a remote folder with all of its subfolders")
    .action(async (remote: string, local: string, options: DownloadOptions) => {
        try {
            const endpoint = await resolveEndpoint(options);
            const logger = createLogger({
                verbose: options.verbose,
                logFile: options.logFile || undefined
            });
            const onEvent = (event: DownloadEvent) => {
                const prefix = process.stdout.isTTY ? "\r\x1b[K" : "";
                if (event.type === "downloaded") {
                    console.log(`${prefix}${color("downloaded", "green")} ${event.localPath} (${byteToSize(event.bytes)})`);
                } else {
                    console.log(`${prefix}${color("skipped", "yellow")}    ${event.remoteUrl}: ${event.reason}`);
                }
            };
            const { walker } = buildServices(endpoint, logger, onEvent);

            const summary = await walker.downloadTree(remote, resolveLocalPath(local));

            console.log(
                `\n${summary.folders} folders, ${color(`${summary.downloaded} files downloaded`, "green")}` +
                ` (${byteToSize(summary.bytes)}), ` +
                color(`${summary.skipped} skipped`, summary.skipped > 0 ? "yellow" : "green")
            );
            if (summary.skipped > 0) {
                process.exitCode = 2;
            }
        } catch (error) {
            reportError(error);
        }
    });

program.parseAsync(process.argv).catch(reportError);
