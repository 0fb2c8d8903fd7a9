import * as fs from 'fs';
import * as path from 'path';

export interface IPath {
    resolve(...paths: string[]): string;
    dirname(p: string): string;
    basename(p: string, ext?: string): string;
    join(...paths: string[]): string;
}

export interface IFileSystem {
    readFile(filePath: string): Promise<string>;
    /** Replaces the whole file. Readers never observe a partially written file. */
    writeFile(filePath: string, content: string): Promise<void>;
    exists(filePath: string): Promise<boolean>;
    readonly path: IPath;
}

export class NodeFileSystem implements IFileSystem {
    readonly path = path;

    async readFile(filePath: string): Promise<string> {
        return fs.promises.readFile(filePath, 'utf-8');
    }

    async writeFile(filePath: string, content: string): Promise<void> {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            await fs.promises.mkdir(dir, { recursive: true });
        }
        // Write next to the target, then rename over it.
        const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
        try {
            await fs.promises.writeFile(tempPath, content);
            if (await this.exists(filePath)) {
                // The rename replaces the inode; keep the permission bits of the file it replaces.
                const { mode } = await fs.promises.stat(filePath);
                await fs.promises.chmod(tempPath, mode & 0o7777);
            }
            await fs.promises.rename(tempPath, filePath);
        } catch (e) {
            await fs.promises.rm(tempPath, { force: true });
            throw e;
        }
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fs.promises.access(filePath);
            return true;
        } catch {
            return false;
        }
    }
}
