type Bai2ErrorCode = 'E_NO_DATA' | 'E_UNPARSEABLE';

/** Base error for structural BAI2 failures. */
export class Bai2Error extends Error {
    readonly code: Bai2ErrorCode;

    constructor(message: string, code: Bai2ErrorCode) {
        super(message);
        this.name = 'Bai2Error';
        this.code = code;
    }
}

/** Content is empty or whitespace only: there is nothing to process. */
export class Bai2EmptyInputError extends Bai2Error {
    constructor(message = 'BAI2 parser: Input is empty') {
        super(message, 'E_NO_DATA');
        this.name = 'Bai2EmptyInputError';
    }
}

/** Content has records but no file header: it is not a BAI2 file. */
export class Bai2FormatError extends Bai2Error {
    readonly lineCount: number;

    constructor(message: string, lineCount: number) {
        super(message, 'E_UNPARSEABLE');
        this.name = 'Bai2FormatError';
        this.lineCount = lineCount;
    }
}
