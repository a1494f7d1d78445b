// src/core/errors.ts

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export interface Diagnostic {
    line: number; // 1-based, 0 when not tied to a source file
    column?: number; // 1-based (optional)
    message: string;
    severity: DiagnosticSeverity;
    code?: string;
}

export type GenerationErrorCode =
    | 'UnterminatedPlaceholder'
    | 'NestedPlaceholder'
    | 'InvalidPlaceholderName'
    | 'UnmatchedCloseDelimiter'
    | 'UnknownSchemaType'
    | 'DuplicateField'
    | 'MissingSchema'
    | 'UnusedSchema'
    | 'UnboundPlaceholder'
    | 'SignatureMismatch'
    | 'HelperConflict'
    | 'InvalidAnnotation';

export interface GenerationErrorDetails {
    /** 1-based column inside the template or annotation. */
    column?: number;
    /** Offending placeholder name, for placeholder errors. */
    placeholder?: string;
    file?: string;
    /** 1-based source line of the annotated function. */
    line?: number;
}

/**
 * Fatal build-time error. Nothing is emitted for a function (or file)
 * that produced one of these.
 */
export class GenerationError extends Error {
    readonly code: GenerationErrorCode;
    readonly column: number | undefined;
    readonly placeholder: string | undefined;
    readonly file: string | undefined;
    readonly line: number | undefined;

    constructor(
        code: GenerationErrorCode,
        message: string,
        details: GenerationErrorDetails = {},
    ) {
        super(message);
        this.name = 'GenerationError';
        this.code = code;
        this.column = details.column;
        this.placeholder = details.placeholder;
        this.file = details.file;
        this.line = details.line;
    }

    /**
     * Copy of this error located at a source position.
     */
    at(file: string, line: number): GenerationError {
        return new GenerationError(this.code, this.message, {
            column: this.column,
            placeholder: this.placeholder,
            file,
            line,
        });
    }

    /**
     * "file:line: [Code] message" when located, "[Code] message" otherwise.
     */
    format(): string {
        const where = this.file
            ? `${this.file}${this.line !== undefined ? `:${this.line}` : ''}: `
            : '';
        return `${where}[${this.code}] ${this.message}`;
    }
}

export function isGenerationError(err: unknown): err is GenerationError {
    return err instanceof GenerationError;
}
