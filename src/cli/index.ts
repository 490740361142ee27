export { dispatch } from './dispatcher.js';
export type { Output } from './dispatcher.js';
export { MESSAGES, ARITY, isCommand, parseSearchArgs, parseListArgs, parseInsertArgs, parseDeleteArgs } from './args.js';
export type { Command } from './args.js';
export { formatEntry, formatList, EMPTY_LIST } from './format.js';
