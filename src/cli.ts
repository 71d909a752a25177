#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { buildDocument, serializeDocument } from './export/document';
import { LayoutConfig, loadLayoutConfig, resolveLayoutConfig } from './layout/config';
import { ExpansionController } from './layout/expansion';
import { NodeIndex } from './layout/nodeIndex';
import { ImmediateScheduler, Scheduler } from './layout/scheduler';
import { MemoryMapDocument } from './models/types';
import { parseDescription } from './parsers/descriptionParser';
import { OutlineSurface } from './providers/outlineSurface';
import { TreeValidationError } from './util/errors';

export interface CliIO {
    log(line: string): void;
    error(line: string): void;
}

const consoleIO: CliIO = {
    log: line => console.log(line),
    error: line => console.error(line),
};

export interface OutlineOptions {
    expandAll?: boolean;
    viewport?: number;
    config?: LayoutConfig;
    scheduler?: Scheduler;
}

/**
 * Lay the document out headlessly, optionally expand everything, wait for
 * the deferred relayout to finish and return the outline.
 */
export async function renderOutline(doc: MemoryMapDocument, options: OutlineOptions = {}): Promise<string[]> {
    const config = options.config ?? resolveLayoutConfig();
    const surface = new OutlineSurface();
    const scheduler = options.scheduler ?? new ImmediateScheduler();
    const controller = new ExpansionController(new NodeIndex(doc.nodes), surface, scheduler, config);

    controller.renderTop(options.viewport ?? config.defaultViewport);
    await controller.whenSettled();
    if (options.expandAll) {
        controller.expandAll();
        await controller.whenSettled();
    }
    return surface.toLines();
}

function parseViewport(value: string): number {
    const viewport = Number(value);
    if (!Number.isInteger(viewport) || viewport <= 0) {
        throw new InvalidArgumentError('must be a positive integer');
    }
    return viewport;
}

type CliOptions = {
    out: string;
    outline?: boolean;
    expandAll?: boolean;
    viewport?: number;
    config?: string;
};

function buildProgram(io: CliIO): Command {
    return new Command()
        .name('memmap-view')
        .description('Lay out an address-space description and export it as a flat document.')
        .usage('<description.json> [options]')
        .argument('<description>', 'range tree description (JSON)')
        .option('-o, --out <file>', 'document output path', 'memmap.json')
        .option('--outline', 'print the settled layout')
        .option('--expand-all', 'expand every block before printing the layout')
        .option('--viewport <px>', 'top-level height budget', parseViewport)
        .option('--config <file>', 'layout config overrides (JSON)')
        .allowExcessArguments(false)
        .showHelpAfterError()
        .exitOverride()
        .configureOutput({
            writeOut: str => io.log(str.trimEnd()),
            writeErr: str => io.error(str.trimEnd()),
        });
}

/**
 * Run the command line. Resolves to the exit code: 0 on success, 1 when the
 * description or config is rejected, 2 on a usage error.
 */
export async function run(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
    const program = buildProgram(io);
    try {
        program.parse([...argv], { from: 'user' });
    } catch (err) {
        if (err instanceof CommanderError) {
            return err.code === 'commander.helpDisplayed' ? 0 : 2;
        }
        throw err;
    }

    const options = program.opts<CliOptions>();
    const input = program.args[0];
    try {
        const config = options.config ? loadLayoutConfig(options.config) : resolveLayoutConfig();
        const viewport = options.viewport ?? config.defaultViewport;

        const root = parseDescription(fs.readFileSync(input, 'utf8'));
        const doc = buildDocument(root);

        fs.writeFileSync(options.out, serializeDocument(doc, 2) + '\n', 'utf8');
        io.log(`Wrote: ${options.out}`);

        const expandAll = options.expandAll === true;
        if (options.outline || expandAll) {
            io.log(`${doc.root.name} (${path.basename(input)})`);
            for (const line of await renderOutline(doc, { expandAll, viewport, config })) {
                io.log(line);
            }
        }
        return 0;
    } catch (err) {
        if (err instanceof TreeValidationError) {
            io.error(err.message);
            return 1;
        }
        if (err instanceof Error) {
            io.error(`Error: ${err.message}`);
            return 1;
        }
        throw err;
    }
}

if (require.main === module) {
    run(process.argv.slice(2)).then(
        code => { process.exitCode = code; },
        (err: unknown) => {
            console.error(err);
            process.exitCode = 1;
        },
    );
}
