import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NodeFileSystem } from './fileSystem';

describe('NodeFileSystem', () => {
    let dir: string;
    const nodeFs = new NodeFileSystem();

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'anchor-patch-'));
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('creates missing directories and replaces files', async () => {
        const file = path.join(dir, 'nested', 'main.rs');
        await nodeFs.writeFile(file, 'one');
        await nodeFs.writeFile(file, 'two');

        expect(await nodeFs.readFile(file)).toBe('two');
        expect(await fs.promises.readdir(path.join(dir, 'nested'))).toEqual(['main.rs']);
    });

    it('reports whether a file exists', async () => {
        const file = path.join(dir, 'a.txt');
        expect(await nodeFs.exists(file)).toBe(false);
        await nodeFs.writeFile(file, '');
        expect(await nodeFs.exists(file)).toBe(true);
    });

    it('keeps the permission bits of the file it replaces', async () => {
        const file = path.join(dir, 'run.sh');
        await nodeFs.writeFile(file, 'echo one\n');
        await fs.promises.chmod(file, 0o755);

        await nodeFs.writeFile(file, 'echo two\n');

        expect((await fs.promises.stat(file)).mode & 0o777).toBe(0o755);
        expect(await nodeFs.readFile(file)).toBe('echo two\n');
    });
});
