import Parser from 'tree-sitter';
import JavaScript from 'tree-sitter-javascript';
import { InitializationError } from '../common/errors';
import { createLogger } from '../common/logger';

const log = createLogger('parser');

export type Grammar = typeof JavaScript;

/** Characters handed to tree-sitter per input callback. */
const INPUT_CHUNK = 8192;

/**
 * Syntax-tree engine: parses source text and compiles structural queries
 * against one grammar.
 */
export interface SyntaxEngine {
    readonly language: string;
    parse(source: string): Parser.Tree;
    compileQuery(source: string): Parser.Query;
}

export class TreeSitterEngine implements SyntaxEngine {
    private readonly parser: Parser;

    constructor(readonly language: string, private readonly grammar: Grammar) {
        try {
            this.parser = new Parser();
            this.parser.setLanguage(grammar);
        } catch (error) {
            throw new InitializationError(`Failed to load ${language} grammar`, { cause: error });
        }
        log.debug('Grammar loaded', { language });
    }

    public parse(source: string): Parser.Tree {
        // Chunked input keeps large files under the binding's buffer limit.
        return this.parser.parse((index: number) =>
            index < source.length ? source.slice(index, index + INPUT_CHUNK) : null
        );
    }

    public compileQuery(source: string): Parser.Query {
        try {
            return new Parser.Query(this.grammar, source);
        } catch (error) {
            throw new InitializationError(`Failed to compile ${this.language} query`, { cause: error });
        }
    }
}

export function createJavaScriptEngine(): TreeSitterEngine {
    return new TreeSitterEngine('javascript', JavaScript);
}
