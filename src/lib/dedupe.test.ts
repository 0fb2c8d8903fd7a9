import { commentOutDuplicates, commentOutLines, removeDuplicateLines } from './dedupe';
import { MemoryFileSystem } from './memoryFileSystem';
import { PatchApplier } from './patch';

const file = '/src/lib.rs';

describe('commentOutLines', () => {
    it('prefixes lines that are not comments yet', () => {
        expect(commentOutLines('fn d() {\n    // note\n    x();\n}')).toBe('// fn d() {\n    // note\n//     x();\n// }');
    });

    it('takes another prefix', () => {
        expect(commentOutLines('a\nb\n', '#')).toBe('# a\n# b');
    });
});

describe('commentOutDuplicates', () => {
    const content = 'fn dup() {\n    first();\n}\n\nfn dup() {\n    second();\n}\n';

    it('keeps the first declaration and comments out the rest', async () => {
        const fs = new MemoryFileSystem({ [file]: content });
        const logs: string[] = [];
        const applier = new PatchApplier(fs, { logger: () => {}, useLedger: false });

        const report = await commentOutDuplicates(fs, applier, file, 'fn dup()', { logger: m => logs.push(m) });

        expect(report.occurrences).toBe(2);
        expect(report.results.map(r => r.status)).toEqual(['applied']);
        expect(report.results[0].operation.description).toBe('comment out duplicate at line 5');
        expect(fs.toJson()).toEqual({
            '/src/lib.rs': 'fn dup() {\n    first();\n}\n\n// fn dup() {\n//     second();\n// }\n',
            '/src/lib.rs.bak_dedupe': content,
        });
        expect(logs).toEqual(['Found 2 occurrences of "fn dup()"; keeping the first']);
    });

    it('finds nothing left to do the second time', async () => {
        const fs = new MemoryFileSystem({ [file]: content });
        const applier = new PatchApplier(fs, { logger: () => {}, useLedger: false });
        await commentOutDuplicates(fs, applier, file, 'fn dup()', { logger: () => {} });
        const after = fs.toJson();

        const logs: string[] = [];
        const report = await commentOutDuplicates(fs, applier, file, 'fn dup()', { logger: m => logs.push(m) });

        expect(report.occurrences).toBe(1);
        expect(report.results).toEqual([]);
        expect(fs.toJson()).toEqual(after);
        expect(logs).toEqual(['No duplicates of "fn dup()" in /src/lib.rs']);
    });

    it('comments out only the duplicated import line', async () => {
        const fs = new MemoryFileSystem({ [file]: 'use std::sync::Arc;\nuse std::sync::Arc;\n\nfn main() {\n    run();\n}\n' });
        const applier = new PatchApplier(fs, { logger: () => {}, useLedger: false });

        await commentOutDuplicates(fs, applier, file, 'use std::sync::Arc;', { logger: () => {} });

        expect(await fs.readFile(file)).toBe('use std::sync::Arc;\n// use std::sync::Arc;\n\nfn main() {\n    run();\n}\n');
    });

    it('keeps code that precedes a duplicate on its line', async () => {
        const fs = new MemoryFileSystem({ [file]: 'fn dup() { a }\nfn x() {} fn dup() { b }\n' });
        const applier = new PatchApplier(fs, { logger: () => {}, useLedger: false });

        await commentOutDuplicates(fs, applier, file, 'fn dup()', { logger: () => {} });

        expect(await fs.readFile(file)).toBe('fn dup() { a }\nfn x() {} // fn dup() { b }\n');
    });

    it('handles several duplicates in one write', async () => {
        const fs = new MemoryFileSystem({ [file]: 'fn d() { a }\nfn d() { b }\nfn d() { c }\n' });
        const applier = new PatchApplier(fs, { logger: () => {}, useLedger: false });

        const report = await commentOutDuplicates(fs, applier, file, 'fn d()', { logger: () => {}, tag: 'dups' });

        expect(report.results).toHaveLength(2);
        expect(fs.toJson()).toEqual({
            '/src/lib.rs': 'fn d() { a }\n// fn d() { b }\n// fn d() { c }\n',
            '/src/lib.rs.bak_dups': 'fn d() { a }\nfn d() { b }\nfn d() { c }\n',
        });
    });
});

describe('removeDuplicateLines', () => {
    const content = 'use a;\nuse b;\nuse a;\nuse a;\nfn main() {}\nuse a;';

    it('deletes later copies of a line', async () => {
        const fs = new MemoryFileSystem({ [file]: content });
        const logs: string[] = [];
        const applier = new PatchApplier(fs, { logger: () => {}, useLedger: false });

        const report = await removeDuplicateLines(fs, applier, file, 'use a;', { logger: m => logs.push(m) });

        expect(report.occurrences).toBe(4);
        expect(report.results.map(r => r.operation.description)).toEqual(['remove duplicate lines 3..4', 'remove duplicate line 6']);
        expect(fs.toJson()).toEqual({
            '/src/lib.rs': 'use a;\nuse b;\nfn main() {}',
            '/src/lib.rs.bak_dedupe': content,
        });
        expect(logs).toEqual(['Found 4 copies of "use a;"; keeping the first']);
    });

    it('only matches the exact line', async () => {
        const fs = new MemoryFileSystem({ [file]: 'use a;\n    use a;\n' });
        const logs: string[] = [];
        const applier = new PatchApplier(fs, { logger: () => {}, useLedger: false });

        const report = await removeDuplicateLines(fs, applier, file, 'use a;\n', { logger: m => logs.push(m) });

        expect(report.results).toEqual([]);
        expect(fs.toJson()).toEqual({ [file]: 'use a;\n    use a;\n' });
        expect(logs).toEqual(['No duplicates of "use a;" in /src/lib.rs']);
    });

    it('finds nothing to remove the second time', async () => {
        const fs = new MemoryFileSystem({ [file]: 'use a;\nuse a;\n' });
        const applier = new PatchApplier(fs, { logger: () => {} });

        const first = await removeDuplicateLines(fs, applier, file, 'use a;', { logger: () => {} });
        const second = await removeDuplicateLines(fs, applier, file, 'use a;', { logger: () => {} });

        expect(first.results.map(r => r.status)).toEqual(['applied']);
        expect(second.occurrences).toBe(1);
        expect(await fs.readFile(file)).toBe('use a;\n');
    });
});
