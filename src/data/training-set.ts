import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { TextClassifier } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const sampleSchema = z.object({
    category: z.string(),
    text: z.string(),
});

const trainingSetSchema = z.array(sampleSchema);

/**
 * One labelled training document.
 */
export type TrainingSample = z.infer<typeof sampleSchema>;

/**
 * Read a JSON array of `{ category, text }` samples.
 */
export async function loadTrainingSet(path: string): Promise<TrainingSample[]> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    const parsed = trainingSetSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? issue.path.join('.') || '(root)' : '(root)';
        throw new Error(`Invalid training set ${path} at ${where}: ${issue?.message ?? 'unknown error'}`);
    }
    return parsed.data;
}

/**
 * Train sequentially, in file order.
 */
export async function trainAll(classifier: TextClassifier, samples: readonly TrainingSample[]): Promise<void> {
    for (const sample of samples) {
        await classifier.train(sample.text, sample.category);
    }
    getLogger().debug({ samples: samples.length }, 'Training set loaded');
}
