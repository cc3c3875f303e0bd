import path from "path";
import os from "os";

// resolve ~ and relative local paths to an absolute path
export function resolveLocalPath(inputPath: string): string {
    return path.resolve(inputPath.replace(/^~(?=$|[\\/])/, os.homedir()));
}
