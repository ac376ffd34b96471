// src/cli/index.ts
import { Command } from 'commander';
import * as path from 'node:path';
import figlet from 'figlet';
import inquirer from 'inquirer';
import { rainbow } from 'gradient-string';
import cliProgress from 'cli-progress';
import { config } from '../config/index.ts';
import { runPrintJob } from '../core/printJob/index.ts';
import { getLabel, labelsForBrand, loadLabelCatalog } from '../core/labels/labelCatalog.ts';
import { labelPixelSize } from '../core/labelFitting/geometry.ts';
import { parseDitherAlgorithm, SupportedDitherAlgorithms } from '../core/dithering/ditherAlgorithms.ts';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';
import {
    brandForPrinter,
    defaultPrintOptions,
    listPrinters,
    selectPreferredPrinter,
} from '../utils/printing/printerUtils.ts';
import { LpSpooler } from '../utils/printing/LpSpooler.ts';
import { defaultOutputPath, filePathExists } from '../utils/storage/storageUtils.ts';
import { PrintJobStates } from '../stateMachine/definedStates.ts';
import { parseFactor, parseInteger } from './optionParsers.ts';
import type { ILogger, IPrintJobOptions, IProgressBar } from '../@types/index.ts';

interface IProcessingFlags {
    input: string;
    label: string;
    brightness: number;
    contrast: number;
    dither: string;
    history: number;
    ratio: number;
    log?: boolean;
    verbose?: boolean;
}

interface IPrintFlags extends IProcessingFlags {
    printer?: string;
    options?: string;
    save?: string;
}

interface IRenderFlags extends IProcessingFlags {
    output?: string;
}

const program = new Command();
program
    .name('label-dither')
    .description('Turn photos into 1-bit rasters sized for thermal label printers')
    .version('1.0.0');

function withProcessingOptions(command: Command): Command {
    return command
        .requiredOption('-i, --input <file>', 'Image to print')
        .option('-l, --label <code>', `Label code from the catalog (Default: ${config.labels.defaultLabel})`, config.labels.defaultLabel)
        .option('-b, --brightness <factor>', `Brightness factor (Default: ${config.enhancement.brightness})`, parseFactor, config.enhancement.brightness)
        .option('-c, --contrast <factor>', `Contrast factor (Default: ${config.enhancement.contrast})`, parseFactor, config.enhancement.contrast)
        .option('-d, --dither <algorithm>', `Dithering algorithm (Default: ${config.ditherAlgorithm})`, config.ditherAlgorithm)
        .option('--history <depth>', `Riemersma history depth, 2-32 (Default: ${config.riemersma.history})`, parseInteger, config.riemersma.history)
        .option('--ratio <ratio>', `Riemersma decay ratio, 0-1 exclusive (Default: ${config.riemersma.ratio})`, parseFactor, config.riemersma.ratio)
        .option('--log', 'Enable logging instead of the progress bar')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError();
}

function createProgressBar(enabled: boolean): IProgressBar | undefined {
    if (!enabled) return undefined;
    const progressBar = new cliProgress.SingleBar({
        format: 'Processing |{bar}| {percentage}% || {value}/{total} state: {state}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
    }, cliProgress.Presets.shades_grey);
    // every state but ERROR is entered once
    const steps = Object.keys(PrintJobStates).length - 1;
    progressBar.start(steps, 0, { state: PrintJobStates.INIT });
    return progressBar;
}

function buildJobOptions(flags: IProcessingFlags, logger: ILogger): Omit<IPrintJobOptions, 'outputFile' | 'print' | 'progressBar'> {
    if (!filePathExists(flags.input)) {
        throw new Error(`Input image "${flags.input}" does not exist`);
    }
    const label = getLabel(loadLabelCatalog(), flags.label);
    return {
        source: path.resolve(flags.input),
        label,
        enhancement: { brightness: flags.brightness, contrast: flags.contrast },
        dither: parseDitherAlgorithm(flags.dither, { history: flags.history, ratio: flags.ratio }),
        verbose: flags.verbose ?? false,
        logger,
    };
}

async function choosePrinter(requested: string | undefined, logger: ILogger): Promise<string> {
    if (requested) return requested;
    const printers = await listPrinters(logger);
    if (printers.length === 0) {
        throw new Error('No printers found. Check your connections or pass --printer.');
    }
    const preferred = selectPreferredPrinter(printers);
    if (preferred) {
        logger.info(`Auto-selected printer: ${preferred}`);
        return preferred;
    }
    const answers = await inquirer.prompt<{ printer: string }>([
        {
            type: 'list',
            name: 'printer',
            message: 'Select a printer:',
            choices: printers,
        },
    ]);
    return answers.printer;
}

withProcessingOptions(
    program
        .command('print')
        .description('Dither an image for a label and send it to a printer'),
)
    .option('-p, --printer <name>', 'Printer destination (Default: auto-detect)')
    .option('-O, --options <options>', 'Extra printer options, e.g. "Darkness=10"')
    .option('-s, --save <file>', 'Also save the dithered PNG')
    .action(async (flags: IPrintFlags) => {
        const logger = getLogger('print', flags.log || flags.verbose ? console : NoopLogFacility, flags.verbose ?? false);
        let progressBar: IProgressBar | undefined;
        try {
            const jobOptions = buildJobOptions(flags, logger);
            const printer = await choosePrinter(flags.printer, logger);
            const brand = brandForPrinter(printer);
            if (!labelsForBrand(loadLabelCatalog(), brand).some((l) => l.code === flags.label)) {
                logger.warn(`Label ${flags.label} is not listed for ${brand} printers`);
            }
            progressBar = createProgressBar(!flags.log && !flags.verbose);
            await runPrintJob({
                ...jobOptions,
                outputFile: flags.save ? path.resolve(flags.save) : undefined,
                print: {
                    printer,
                    spooler: new LpSpooler(logger),
                    options: flags.options ?? defaultPrintOptions(brand),
                },
                progressBar,
            });
            progressBar?.stop();
            console.log(`Print job sent to ${printer}`);
            process.exit(0);
        } catch (error) {
            progressBar?.stop();
            console.error(`Printing failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        }
    });

withProcessingOptions(
    program
        .command('render')
        .description('Dither an image for a label and save it as PNG'),
)
    .option('-o, --output <file>', 'Output PNG (Default: input name with .png)')
    .action(async (flags: IRenderFlags) => {
        const logger = getLogger('render', flags.log || flags.verbose ? console : NoopLogFacility, flags.verbose ?? false);
        let progressBar: IProgressBar | undefined;
        try {
            const jobOptions = buildJobOptions(flags, logger);
            const outputFile = path.resolve(flags.output ?? defaultOutputPath(flags.input));
            progressBar = createProgressBar(!flags.log && !flags.verbose);
            const result = await runPrintJob({ ...jobOptions, outputFile, progressBar });
            progressBar?.stop();
            console.log(`Saved ${result.raster.width}x${result.raster.height} label to ${result.outputFile}`);
            process.exit(0);
        } catch (error) {
            progressBar?.stop();
            console.error(`Rendering failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        }
    });

program
    .command('labels')
    .description('List the label catalog')
    .option('--brand <brand>', 'Only labels for "dymo" or "generic" printers')
    .action((flags: { brand?: string }) => {
        const catalog = loadLabelCatalog();
        const labels = flags.brand === 'dymo' || flags.brand === 'generic' ? labelsForBrand(catalog, flags.brand) : catalog;
        for (const label of labels) {
            const { widthPx, heightPx } = labelPixelSize(label);
            console.log(`${label.code.padEnd(10)} ${label.name.padEnd(32)} ${widthPx} x ${heightPx} px @ ${label.dpi} dpi`);
        }
    });

program
    .command('printers')
    .description('List available printers')
    .action(async () => {
        const logger = getLogger('printers');
        const printers = await listPrinters(logger);
        const preferred = selectPreferredPrinter(printers);
        if (printers.length === 0) {
            console.log('No printers found.');
            return;
        }
        for (const printer of printers) {
            console.log(`${printer === preferred ? '*' : ' '} ${printer}`);
        }
    });

program
    .command('algorithms')
    .description('List dithering algorithms')
    .action(() => {
        for (const name of Object.values(SupportedDitherAlgorithms)) {
            console.log(name);
        }
    });

if (process.stdout.isTTY) {
    console.log(rainbow.multiline(
        figlet.textSync('label-dither', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
}
await program.parseAsync(process.argv);
