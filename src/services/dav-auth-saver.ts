import fs from "fs"
import crypto from "crypto";
import { PROFILE_DIR } from "../config.js";
import type { DavProfile } from "@services/dav-api.js"

const defaultName = "default";

function getFileName(account: string | undefined): string {
    if (!account) return defaultName;
    return crypto.createHash("sha256").update(account).digest("hex") + "-dav";
}

function isDavProfile(value: unknown): value is DavProfile {
    if (typeof value !== "object" || value === null) return false;
    return "hostname" in value && typeof value.hostname === "string"
        && "username" in value && typeof value.username === "string"
        && "password" in value && typeof value.password === "string";
}

// read a saved profile from "~/.davmirror", the default one when no account is given
function getDavProfile(account: string | undefined, dirPath: string = PROFILE_DIR): DavProfile | undefined {
    const path = `${dirPath}/${getFileName(account)}`;
    if (!fs.existsSync(path)) return undefined;
    const profile: unknown = JSON.parse(Buffer.from(fs.readFileSync(path, "utf8"), "base64").toString());
    if (!isDavProfile(profile)) {
        throw new Error(`Saved profile ${path} is malformed, run \`davmirror login\` again`);
    }
    return profile;
}

function setDavProfile(account: string | undefined, profile: DavProfile, dirPath: string = PROFILE_DIR) {
    fs.mkdirSync(dirPath, { recursive: true, mode: 0o700 });
    const path = `${dirPath}/${getFileName(account)}`;
    fs.writeFileSync(path, Buffer.from(JSON.stringify(profile)).toString("base64"), { mode: 0o600 });
}

function deleteDavProfile(account: string | undefined, dirPath: string = PROFILE_DIR): boolean {
    const path = `${dirPath}/${getFileName(account)}`;
    if (!fs.existsSync(path)) return false;
    fs.unlinkSync(path);
    return true;
}

export { getDavProfile, setDavProfile, deleteDavProfile }
