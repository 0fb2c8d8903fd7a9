#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
    AnchorEdit,
    AnchorNotFoundError,
    BaselineStore,
    CommandChecker,
    CommentOutLinePolicy,
    DEFAULT_BASELINE_PATH,
    DEFAULT_CHECKER_COMMAND,
    DEFAULT_CONTEXT_RADIUS,
    DEFAULT_MAX_ITERATIONS,
    ENV_PREFIX,
    EXIT_FAILURE,
    EXIT_PARTIAL,
    EXIT_SUCCESS,
    ExternalCheckerFailedError,
    MAX_NEW_ERROR_EXAMPLES,
    NodeFileSystem,
    PatchApplier,
    RangeOutOfBoundsError,
    RepairFailedError,
    RepairLoop,
    UnbalancedAnchorError,
    analyzeDelimiters,
    commentOutDuplicates,
    createBaseline,
    describePatch,
    diffAgainstBaseline,
    formatContext,
    formatDelimiterReport,
    formatDiff,
    formatSummary,
    normalizeGlob,
    problemLines,
    removeDuplicateLines,
    runCheck,
    splitLines,
    strayClosingDelimiterPolicy,
    summarizeDiagnostics,
} from '../lib';

const nodeFs = new NodeFileSystem();
const anchorEdits: AnchorEdit[] = ['insert-before', 'prepend-body', 'append-body', 'insert-after', 'replace'];

function fail(e: unknown): never {
    if (e instanceof AnchorNotFoundError || e instanceof UnbalancedAnchorError
        || e instanceof RangeOutOfBoundsError || e instanceof ExternalCheckerFailedError
        || e instanceof RepairFailedError) {
        console.error(`error: ${e.message}`);
    } else {
        console.error(e);
    }
    process.exit(EXIT_FAILURE);
}

function createApplier(useLedger: boolean): PatchApplier {
    return new PatchApplier(nodeFs, { logger: console.log, useLedger });
}

function isAnchorEdit(value: string): value is AnchorEdit {
    return anchorEdits.some(edit => edit === value);
}

yargs(hideBin(process.argv))
    .scriptName('anchor-patch')
    .env(ENV_PREFIX)
    .option('ledger', {
        type: 'boolean',
        default: true,
        describe: 'Record applied operations in <file>.patch-ledger.json (use --no-ledger to disable)'
    })
    .command('run-diff [extra..]', 'Run the checker, summarize its diagnostics and diff them against a baseline', (yargs) => {
        return yargs
            .positional('extra', {
                describe: 'Extra arguments passed to the checker',
                type: 'string',
                array: true,
                default: []
            })
            .option('save', {
                type: 'boolean',
                default: true,
                describe: 'Update the baseline file (use --no-save to leave it alone)'
            })
            .option('baseline', {
                type: 'string',
                default: DEFAULT_BASELINE_PATH,
                describe: 'Baseline file path'
            })
            .option('compare', {
                type: 'string',
                describe: 'Diff against this baseline file instead'
            })
            .option('checker', {
                type: 'string',
                default: DEFAULT_CHECKER_COMMAND,
                describe: 'Command that prints JSON diagnostics on stdout'
            })
            .option('timeout', {
                type: 'number',
                describe: 'Checker timeout in milliseconds'
            });
    }, async (argv) => {
        try {
            const checker = new CommandChecker(argv.checker, argv.extra, { timeoutMs: argv.timeout });
            const { diagnostics, returnCode, skipped } = runCheck(checker);
            if (skipped.length > 0) {
                console.log(`(skipped ${skipped.length} malformed line(s) of checker output)`);
            }

            const store = new BaselineStore(nodeFs, console.log);
            const previous = await store.load(argv.compare ?? argv.baseline);

            console.log('\n' + formatSummary(summarizeDiagnostics(diagnostics)));
            if (previous) {
                console.log('\n' + formatDiff(diffAgainstBaseline(previous, diagnostics), diagnostics, MAX_NEW_ERROR_EXAMPLES));
            } else {
                console.log('\n(no previous baseline to diff against)');
            }

            if (argv.save) {
                const current = createBaseline(diagnostics, returnCode);
                await store.save(argv.baseline, current);
                console.log(`\nSaved baseline to ${argv.baseline} at ${current.timestamp}`);
            } else {
                console.log('\n(Did not save baseline; use without --no-save to persist)');
            }
        } catch (e) {
            fail(e);
        }
    })
    .command('scan <files..>', 'Report unbalanced delimiters, ignoring strings and comments', (yargs) => {
        return yargs
            .positional('files', {
                describe: 'Files to scan (glob patterns)',
                type: 'string',
                array: true,
                demandOption: true
            })
            .option('report-unmatched', {
                alias: 'u',
                type: 'boolean',
                default: false,
                describe: 'List every problem with surrounding context'
            })
            .option('context', {
                type: 'number',
                default: DEFAULT_CONTEXT_RADIUS,
                describe: 'Lines of context around each problem'
            });
    }, async (argv) => {
        try {
            const files = normalizeGlob(argv.files, process.cwd());
            if (files.length === 0) {
                console.error('No files matched');
                process.exit(EXIT_FAILURE);
            }
            for (const file of files) {
                const content = await nodeFs.readFile(file);
                const report = analyzeDelimiters(content);
                console.log(formatDelimiterReport(file, report, argv['report-unmatched']));
                if (argv['report-unmatched'] && report.problems.length > 0) {
                    console.log('\n' + formatContext(splitLines(content), problemLines(report), argv.context));
                }
            }
        } catch (e) {
            fail(e);
        }
    })
    .command('replace-range <file> <start> <end>', 'Replace lines START..END (1-based, inclusive) with the lines of a payload file', (yargs) => {
        return yargs
            .positional('file', { type: 'string', demandOption: true, describe: 'File to patch' })
            .positional('start', { type: 'number', demandOption: true, describe: 'First line' })
            .positional('end', { type: 'number', demandOption: true, describe: 'Last line' })
            .option('with', {
                type: 'string',
                demandOption: true,
                describe: 'Payload file'
            })
            .option('tag', {
                type: 'string',
                default: '',
                describe: 'Backup tag (file.bak_<tag>)'
            });
    }, async (argv) => {
        try {
            const payload = await nodeFs.readFile(argv.with);
            await createApplier(argv.ledger).apply({
                targetFile: argv.file,
                target: { type: 'range', range: { start: argv.start, end: argv.end } },
                replacementText: payload,
                tag: argv.tag,
            });
        } catch (e) {
            fail(e);
        }
    })
    .command('patch-anchor <file>', 'Edit relative to the block that follows a marker', (yargs) => {
        return yargs
            .positional('file', { type: 'string', demandOption: true, describe: 'File to patch' })
            .option('marker', {
                alias: 'm',
                type: 'string',
                demandOption: true,
                describe: 'Text that introduces the block, e.g. a function signature'
            })
            .option('edit', {
                type: 'string',
                choices: anchorEdits,
                default: 'replace',
                describe: 'Where the payload goes'
            })
            .option('with', {
                type: 'string',
                demandOption: true,
                describe: 'Payload file'
            })
            .option('occurrence', {
                type: 'number',
                default: 1,
                describe: 'Which occurrence of the marker (1-based)'
            })
            .option('declaration', {
                type: 'boolean',
                default: false,
                describe: 'Span starts at the marker line instead of the opening brace'
            })
            .option('tag', {
                type: 'string',
                default: 'anchor',
                describe: 'Backup tag (file.bak_<tag>)'
            });
    }, async (argv) => {
        try {
            const edit = argv.edit;
            if (!isAnchorEdit(edit)) {
                throw new Error(`Unknown edit: ${edit}`);
            }
            const payload = await nodeFs.readFile(argv.with);
            await createApplier(argv.ledger).apply({
                targetFile: argv.file,
                target: {
                    type: 'anchor',
                    marker: argv.marker,
                    edit,
                    occurrence: argv.occurrence,
                    span: argv.declaration ? 'declaration' : 'body',
                },
                replacementText: payload,
                tag: argv.tag,
            });
        } catch (e) {
            fail(e);
        }
    })
    .command('dedupe <file>', 'Keep the first occurrence of each marker or line and comment out or delete later copies', (yargs) => {
        return yargs
            .positional('file', { type: 'string', demandOption: true, describe: 'File to patch' })
            .option('marker', {
                alias: 'm',
                type: 'string',
                array: true,
                default: [],
                describe: 'Declaration signature(s) whose later blocks are commented out'
            })
            .option('line', {
                alias: 'l',
                type: 'string',
                array: true,
                default: [],
                describe: 'Exact line(s) whose later copies are deleted'
            });
    }, async (argv) => {
        try {
            if (argv.marker.length === 0 && argv.line.length === 0) {
                throw new Error('Give at least one --marker or --line');
            }
            const applier = createApplier(argv.ledger);
            for (const line of argv.line) {
                await removeDuplicateLines(nodeFs, applier, argv.file, line, { logger: console.log });
            }
            for (const marker of argv.marker) {
                await commentOutDuplicates(nodeFs, applier, argv.file, marker, { logger: console.log });
            }
        } catch (e) {
            fail(e);
        }
    })
    .command('ensure-line <file>', 'Insert a line unless the file already has it', (yargs) => {
        return yargs
            .positional('file', { type: 'string', demandOption: true, describe: 'File to patch' })
            .option('line', {
                alias: 'l',
                type: 'string',
                demandOption: true,
                describe: 'Line to ensure, e.g. an import'
            })
            .option('after', {
                type: 'string',
                describe: 'Insert after the last line starting with this prefix (default: at the top)'
            })
            .option('tag', {
                type: 'string',
                default: 'ensure',
                describe: 'Backup tag (file.bak_<tag>)'
            });
    }, async (argv) => {
        try {
            await createApplier(argv.ledger).apply({
                targetFile: argv.file,
                target: { type: 'ensure-line', afterPrefix: argv.after },
                replacementText: argv.line,
                tag: argv.tag,
            });
        } catch (e) {
            fail(e);
        }
    })
    .command('repair <file>', 'Run the checker and comment out offending lines until it stops reporting them', (yargs) => {
        return yargs
            .positional('file', { type: 'string', demandOption: true, describe: 'File to repair' })
            .option('max-iterations', {
                type: 'number',
                default: DEFAULT_MAX_ITERATIONS,
                describe: 'Safety cap on the number of patches'
            })
            .option('checker', {
                type: 'string',
                default: DEFAULT_CHECKER_COMMAND,
                describe: 'Command that prints JSON diagnostics on stdout'
            })
            .option('code', {
                type: 'string',
                array: true,
                describe: 'Only act on these diagnostic codes'
            })
            .option('match', {
                type: 'string',
                describe: 'Only act on diagnostics whose headline matches this regular expression'
            })
            .option('timeout', {
                type: 'number',
                describe: 'Checker timeout in milliseconds'
            });
    }, async (argv) => {
        try {
            const policy = argv.code || argv.match
                ? new CommentOutLinePolicy({ codes: argv.code, headlinePattern: argv.match ? new RegExp(argv.match) : undefined })
                : strayClosingDelimiterPolicy();
            const checker = new CommandChecker(argv.checker, [], { timeoutMs: argv.timeout });
            const loop = new RepairLoop(nodeFs, checker, createApplier(argv.ledger), policy, {
                maxIterations: argv['max-iterations'],
                logger: console.log,
            });

            const report = await loop.run(argv.file);
            console.log(`\n${report.state}: ${report.iterations} pass(es), ${report.patches.length} patch(es)`);
            for (const patch of report.patches) {
                console.log(`  ${describePatch(patch)}`);
            }
            process.exit(report.state === 'aborted' ? EXIT_PARTIAL : EXIT_SUCCESS);
        } catch (e) {
            if (e instanceof RepairFailedError && e.patches.length > 0) {
                console.log(`\nApplied before the failure:`);
                for (const patch of e.patches) {
                    console.log(`  ${describePatch(patch)}`);
                }
            }
            fail(e);
        }
    })
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync()
    .catch(fail);
