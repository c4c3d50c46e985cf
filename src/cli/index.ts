#!/usr/bin/env node
// src/cli/index.ts

import { Command } from 'commander';
import path from 'node:path';
import figlet from 'figlet';
import gradient from 'gradient-string';
import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { IProgressBar } from '../@types';
import { encodeFile } from '../core/encoder';
import { decodeFile } from '../core/decoder';
import { checkCapacity, maxPayloadBytes } from '../core/capacity/capacityChecker';
import { loadImage } from '../core/imageProcessing/processor';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils';
import { readBufferFromFile } from '../utils/storage/storageUtils';
import { DecoderStates, EncoderStates } from '../stateMachine/definedStates';
import { type IRuleCliOptions, rulesFromCliOptions } from './options';

interface IEncodeCliOptions extends IRuleCliOptions {
    input: string;
    output: string;
    file?: string;
    message?: string;
    verify: boolean;
    log?: boolean;
    verbose?: boolean;
}

interface IDecodeCliOptions extends IRuleCliOptions {
    input: string;
    output?: string;
    raw?: boolean;
    log?: boolean;
    verbose?: boolean;
}

interface ICapacityCliOptions extends IRuleCliOptions {
    input: string;
}

function addRuleOptions(command: Command): Command {
    return command
        .option('-b, --bits <number>', 'Least significant bits used per pixel, 1-8 (Default: 1)')
        .option('-c, --channel <channel>', 'Color channel carrying the data: red, green or blue (Default: blue)')
        .option('--offset <number>', 'Pixels to skip before the first visited pixel (Default: 0)')
        .option('--stride <number>', 'Visit every n-th pixel (Default: 1)')
        .option(
            '--position <position>',
            'Start position: top-left, top-right, bottom-left, bottom-right, center or x,y (Default: top-left)',
        )
        .option('--spread', 'Wrap around the image when a single pass is not enough');
}

function createProgressBar(steps: number): IProgressBar {
    const progressBar = new cliProgress.SingleBar({
        format: 'Processing |{bar}| {percentage}% || {value}/{total} state: {state}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
    }, cliProgress.Presets.shades_grey);
    progressBar.start(steps, 0, { state: 'INIT' });
    return progressBar;
}

function fail(action: string, error: unknown): never {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`${action} failed: ${reason}`));
    process.exit(1);
}

const program = new Command();
program
    .name('bitloom')
    .description('A CLI tool to hide data in the least significant bits of image pixels')
    .version('1.0.0');

addRuleOptions(
    program
        .command('encode')
        .description('Embed a file or a message into an image')
        .requiredOption('-i, --input <image>', 'Carrier image (png, jpeg or bmp)')
        .requiredOption('-o, --output <image>', 'Output image; the format follows the extension')
        .option('-f, --file <file>', 'File to hide')
        .option('-m, --message <text>', 'Text message to hide')
        .option('--marker <text>', 'Append this terminator to the payload'),
)
    .option('--no-verify', 'Skip verification step during encoding')
    .option('-l, --log', 'Enable logging')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (options: IEncodeCliOptions) => {
        const isLogging = options.log || false;
        const verbose = options.verbose || false;
        const logger = getLogger('encoder', isLogging ? console : NoopLogFacility, verbose);
        try {
            const rules = rulesFromCliOptions(options);
            const progressBar = isLogging
                ? undefined
                : createProgressBar(Object.keys(EncoderStates).length - 1);
            const result = await encodeFile({
                imageFile: path.resolve(options.input),
                outputFile: path.resolve(options.output),
                inputFile: options.file === undefined ? undefined : path.resolve(options.file),
                message: options.message,
                rules,
                appendMarker: rules.marker !== undefined,
                verify: options.verify,
                verbose,
                logger,
                progressBar,
            });
            progressBar?.stop();
            console.log(`Embedded ${result.changes().length} bytes into "${options.output}".`);
        } catch (error) {
            fail('Encoding', error);
        }
    });

addRuleOptions(
    program
        .command('decode')
        .description('Extract embedded data from an image')
        .requiredOption('-i, --input <image>', 'Image carrying the data')
        .option('-o, --output <file>', 'Write the extracted bytes to this file instead of printing them')
        .option('--marker <text>', 'Stop at this terminator')
        .option('--raw', 'Keep the marker in the output'),
)
    .option('-l, --log', 'Enable logging')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (options: IDecodeCliOptions) => {
        const isLogging = options.log || false;
        const verbose = options.verbose || false;
        const logger = getLogger('decoder', isLogging ? console : NoopLogFacility, verbose);
        try {
            const progressBar = isLogging || options.output === undefined
                ? undefined
                : createProgressBar(Object.keys(DecoderStates).length - 1);
            const result = await decodeFile({
                imageFile: path.resolve(options.input),
                outputFile: options.output === undefined ? undefined : path.resolve(options.output),
                rules: rulesFromCliOptions(options),
                trimMarker: !options.raw,
                verbose,
                logger,
                progressBar,
            });
            progressBar?.stop();
            if (options.output === undefined) {
                const bytes = options.raw ? result.embeddedData() : result.payload();
                console.log(Buffer.from(bytes).toString('utf8'));
            }
        } catch (error) {
            fail('Decoding', error);
        }
    });

addRuleOptions(
    program
        .command('capacity')
        .description('Show how many bytes an image can carry with the given rules')
        .requiredOption('-i, --input <image>', 'Carrier image'),
)
    .showHelpAfterError()
    .action(async (options: ICapacityCliOptions) => {
        const logger = getLogger('capacity');
        try {
            const rules = rulesFromCliOptions(options);
            const pixels = await loadImage(await readBufferFromFile(path.resolve(options.input)), logger);
            const { availableVisits, singlePassVisits } = checkCapacity(0, rules, pixels.width, pixels.height, logger);
            logger.info(`Image: ${pixels.width}x${pixels.height} (${pixels.pixelCount} pixels)`);
            logger.info(`Pixel visits: ${availableVisits} (${singlePassVisits} in the first pass)`);
            logger.success(`Capacity: ${maxPayloadBytes(rules, pixels.width, pixels.height)} bytes`);
        } catch (error) {
            fail('Capacity check', error);
        }
    });

if (require.main === module) {
    console.log(gradient.rainbow.multiline(
        figlet.textSync('bitloom', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
    program.parseAsync(process.argv).catch((error: unknown) => {
        console.error(error);
        process.exit(1);
    });
}
