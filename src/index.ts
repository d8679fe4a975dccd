/**
 * Public library surface.
 */
export { Classifier, type ClassifierOptions } from './classifier/classifier.js';
export {
    ClassifierError,
    EmptyInputError,
    NoMatchError,
    InvalidOptionError,
    PipelineCancelledError,
    type ClassifierErrorCode,
} from './classifier/errors.js';
export { Tokenizer, lowercase, wordCounts, collectTokens, type TextTokenizer, type TokenizerOptions } from './nlp/tokenizer.js';
export { TokenStream } from './nlp/pipeline.js';
export { BoundedChannel } from './nlp/channel.js';
export { StopwordOracle, getDefaultStopwords, loadStopwords, isStopWord, isNotStopWord } from './nlp/stopwords.js';
export { FrequencyModel } from './model/frequency-model.js';
export { FrequencyTable, type FrequencyView, type FrequencyWriter } from './model/frequency-table.js';
export { tokenProb, weightedProb, textProb, score, scoreAll, pickBest, hasEvidence } from './model/estimator.js';
export { ReadWriteLock } from './utils/rw-lock.js';
export { loadTrainingSet, trainAll, type TrainingSample } from './data/training-set.js';
export * from './types/index.js';
