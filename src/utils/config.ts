import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type TextClassConfig } from '../types/index.js';
import { getLogger, parseLogLevel } from './logger.js';

/**
 * Partial configuration as accepted from CLI flags and the config file.
 */
export type ConfigOverrides = Partial<Omit<TextClassConfig, 'tokenizer'>> & {
    tokenizer?: Partial<TextClassConfig['tokenizer']>;
};

const fileConfigSchema = z
    .object({
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
        tokenizer: z
            .object({
                bufferSize: z.number().int().positive(),
                relayBufferSize: z.number().int().positive(),
            })
            .partial()
            .strict(),
        minTokenWeight: z.number().positive(),
    })
    .partial()
    .strict();

/**
 * Load configuration from textclass.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('textclass', {
        searchPlaces: ['textclass.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = fileConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const logLevel = parseLogLevel(process.env['TEXTCLASS_LOG_LEVEL']);
    if (logLevel) {
        env.logLevel = logLevel;
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(cliFlags: ConfigOverrides, searchFrom?: string): Promise<TextClassConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        tokenizer: {
            ...DEFAULT_CONFIG.tokenizer,
            ...fileConfig?.tokenizer,
            ...cliFlags.tokenizer,
        },
    };
}
