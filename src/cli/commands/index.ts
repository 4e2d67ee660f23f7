export { executeWrapCommand } from './wrap.js';
export type { WrapCommandDeps, WrapCommandOptions } from './wrap.js';

export { executeTranslateCommand } from './translate.js';
export type { TranslateTarget, TranslateCommandOptions } from './translate.js';

export { executeQuoteCommand } from './quote.js';
export type { QuoteCommandOptions } from './quote.js';

export { executeDialectCommand, executeDialectsCommand } from './dialect.js';

export { executeHashCommand, DEFAULT_HASH_ALGORITHM } from './hash.js';
export type { HashCommandDeps, HashCommandOptions } from './hash.js';
