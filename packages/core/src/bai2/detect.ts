/**
 * BAI2 file recognition.
 *
 * Banks deliver BAI2 as .bai, .bai2 or plain .txt. A .txt file is only
 * treated as BAI2 when its first record is a file header.
 */

import { RECORD_TYPE } from '../types/index.js';
import { recordTag, splitLines } from './lines.js';

const BAI2_EXTENSIONS = /\.(bai2?|txt)$/i;

/**
 * True when the filename has a BAI2 extension and is not hidden or temporary.
 */
export function isBai2Filename(filename: string): boolean {
    if (filename.startsWith('.') || filename.startsWith('~')) {
        return false;
    }
    return BAI2_EXTENSIONS.test(filename);
}

/**
 * True when the first non-blank record of the content is a file header.
 */
export function looksLikeBai2(content: string): boolean {
    const [first] = splitLines(content.slice(0, 4096));
    return first !== undefined && recordTag(first.trimStart()) === RECORD_TYPE.FILE_HEADER;
}
