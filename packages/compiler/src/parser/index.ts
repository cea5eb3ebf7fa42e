export { ParserError } from './parser-error';
export { TokenCursor } from './token-cursor';
