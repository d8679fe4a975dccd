import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { Classifier } from '../classifier/classifier.js';
import { ClassifierError } from '../classifier/errors.js';
import { Tokenizer, wordCounts } from '../nlp/tokenizer.js';
import { loadTrainingSet, trainAll } from '../data/training-set.js';
import type { TextClassConfig } from '../types/index.js';

const VERSION = '1.0.0';

export interface CommonFlags {
    logLevel?: string;
    jsonLogs?: boolean;
    bufferSize?: string;
}

interface TrainedFlags extends CommonFlags {
    data: string;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--log-level <level>', 'Log level: silent | debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs')
        .option('--buffer-size <n>', 'Tokenizer source queue capacity');
}

/**
 * Turn CLI flags into config overrides. Flags not given stay unset so the
 * config file and environment still apply.
 */
export function buildOverrides(flags: CommonFlags): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (flags.jsonLogs !== undefined) overrides.jsonLogs = flags.jsonLogs;

    const logLevel = parseLogLevel(flags.logLevel);
    if (flags.logLevel !== undefined && !logLevel) {
        throw new Error(`Invalid log level: ${flags.logLevel}`);
    }
    if (logLevel) overrides.logLevel = logLevel;
    if (flags.bufferSize !== undefined) {
        overrides.tokenizer = { bufferSize: parseInt(flags.bufferSize, 10) };
    }
    return overrides;
}

/**
 * Resolve config from flags and start the logger.
 */
async function setup(flags: CommonFlags): Promise<TextClassConfig> {
    const config = await resolveConfig(buildOverrides(flags));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

async function trainedClassifier(flags: TrainedFlags): Promise<Classifier> {
    const config = await setup(flags);
    const classifier = new Classifier({
        tokenizerOptions: config.tokenizer,
        minTokenWeight: config.minTokenWeight,
    });

    const samples = await loadTrainingSet(flags.data);
    await trainAll(classifier, samples);
    getLogger().info({ samples: samples.length, ...(await classifier.stats()) }, 'Model trained');
    return classifier;
}

function fail(action: string, error: unknown): never {
    if (error instanceof ClassifierError) {
        getLogger().error({ code: error.code }, error.message);
    } else {
        getLogger().error({ error }, `${action} failed`);
    }
    process.exit(1);
}

/**
 * Build the `textclass` program. A fresh instance per run keeps parsed
 * option values from leaking between runs.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('textclass')
        .description('Classify short texts with a word-frequency classifier trained from a JSON file.')
        .version(VERSION);

    // ─── CLASSIFY command ─────────────────────────────────────

    withCommonOptions(
        program
            .command('classify')
            .description('Print the best category and its confidence')
            .argument('<text...>', 'Text to classify')
            .requiredOption('-d, --data <path>', 'Training set (JSON array of { category, text })')
    ).action(async (words: string[], flags: TrainedFlags) => {
        try {
            const classifier = await trainedClassifier(flags);
            const { category, confidence } = await classifier.classify(words.join(' '));
            console.log(`${category}\t${confidence}`);
        } catch (error) {
            fail('Classify', error);
        }
    });

    // ─── PROBS command ────────────────────────────────────────

    withCommonOptions(
        program
            .command('probs')
            .description('Print every positive category score, best first')
            .argument('<text...>', 'Text to score')
            .requiredOption('-d, --data <path>', 'Training set (JSON array of { category, text })')
    ).action(async (words: string[], flags: TrainedFlags) => {
        try {
            const classifier = await trainedClassifier(flags);
            const { scores, best } = await classifier.getProb(words.join(' '));

            const ranked = Array.from(scores.entries()).sort((a, b) => b[1] - a[1]);
            for (const [category, value] of ranked) {
                console.log(`  ${category}: ${value}`);
            }
            console.log(best === '' ? 'No category matched.' : `Best: ${best}`);
        } catch (error) {
            fail('Probs', error);
        }
    });

    // ─── TOKENS command ───────────────────────────────────────

    withCommonOptions(
        program
            .command('tokens')
            .description('Print token frequencies after filtering and normalization')
            .argument('<text...>', 'Text to tokenize')
    ).action(async (words: string[], flags: CommonFlags) => {
        try {
            const config = await setup(flags);
            const counts = await wordCounts(words.join(' '), new Tokenizer(config.tokenizer));
            for (const [token, count] of counts) {
                console.log(`${token}\t${count}`);
            }
        } catch (error) {
            fail('Tokens', error);
        }
    });

    return program;
}
