/**
 * The single error kind raised anywhere in the parse pipeline.
 *
 * Collaborator failures (expression parsing, import lookup) are rewrapped
 * into this class at the call site, so callers only see one error shape.
 */
export class TerraceSyntaxError extends Error {
    /** 1-based source line */
    line: number;
    filename?: string;

    constructor(message: string, line: number, filename?: string) {
        super(message);
        this.name = 'TerraceSyntaxError';
        this.line = line;
        this.filename = filename;
    }

    /**
     * Attach the document's filename once the error crosses the parse boundary.
     * Values already present win, so errors from imported files keep their origin.
     */
    addMetadata(filename: string | undefined): this {
        if (this.filename === undefined) this.filename = filename;
        return this;
    }

    /** Location suffix like " (line 5)" or " (main.terrace:5)" for log messages */
    get location(): string {
        if (this.filename) return ` (${this.filename}:${this.line})`;
        return ` (line ${this.line})`;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
