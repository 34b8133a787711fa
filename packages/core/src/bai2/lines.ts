/**
 * Line pre-processing: continuation joining and field splitting.
 */

import { BAI2_SYNTAX, RECORD_TYPE } from '../types/index.js';

const CONTINUATION_PREFIX = RECORD_TYPE.CONTINUATION + BAI2_SYNTAX.FIELD_SEPARATOR;

const PADDED_TERMINATOR = /\/\s+$/;

/**
 * Split raw file content into lines, dropping blank ones.
 * Handles both \n and \r\n. Padding after a record terminator is removed;
 * trailing spaces of an unterminated line are memo text and stay.
 */
export function splitLines(content: string): string[] {
    return content
        .split(/\r?\n/)
        .filter(line => line.trim() !== '')
        .map(line => line.replace(PADDED_TERMINATOR, BAI2_SYNTAX.RECORD_TERMINATOR));
}

/**
 * Return the record type tag of a line (its first field).
 */
export function recordTag(line: string): string {
    const idx = line.indexOf(BAI2_SYNTAX.FIELD_SEPARATOR);
    return idx === -1 ? line : line.slice(0, idx);
}

/**
 * Merge continuation records into the logical record they extend.
 *
 * Single left-to-right pass: the payload of each continuation (text after
 * "88,") is appended to the last joined line, whose trailing record
 * terminators are stripped first. A continuation with nothing before it
 * is kept as-is; dispatch will ignore it.
 *
 * PURE FUNCTION: returns a new array.
 */
export function joinContinuations(lines: readonly string[]): string[] {
    const merged: string[] = [];

    for (const line of lines) {
        if (line.trim() === '') continue;

        if (recordTag(line) === RECORD_TYPE.CONTINUATION && merged.length > 0) {
            const payload = line.startsWith(CONTINUATION_PREFIX)
                ? line.slice(CONTINUATION_PREFIX.length)
                : line.slice(RECORD_TYPE.CONTINUATION.length);
            const last = merged.length - 1;
            merged[last] = stripTrailing(merged[last], BAI2_SYNTAX.RECORD_TERMINATOR) + payload;
        } else {
            merged.push(line);
        }
    }

    return merged;
}

/**
 * Split a logical record into fields.
 * The record terminator and any trailing separators are removed first.
 */
export function splitFields(line: string): string[] {
    const body = stripTrailing(
        stripTrailing(line, BAI2_SYNTAX.RECORD_TERMINATOR),
        BAI2_SYNTAX.FIELD_SEPARATOR
    );
    return body.split(BAI2_SYNTAX.FIELD_SEPARATOR);
}

function stripTrailing(value: string, char: string): string {
    let end = value.length;
    while (end > 0 && value[end - 1] === char) {
        end--;
    }
    return value.slice(0, end);
}
