import os from "os";
import path from "path";
import fs from "fs/promises";

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), "rchidrun-test-"));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}
