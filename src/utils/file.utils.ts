/**
 * File Utilities
 */

import fs from "fs";
import path from "path";

// ============================================================================
// FILE DETECTION & DISCOVERY
// ============================================================================

const TRANSCRIPT_EXTENSIONS = new Set(['.txt']);

export function isTranscriptFile(filePath: string): boolean {
    return TRANSCRIPT_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Discovers transcript exports in a directory, recursing into subdirectories.
 * Directories listed in `excludeDirs` (e.g. the output folder) are skipped.
 * Results are sorted so repeated runs visit files in the same order.
 */
export function discoverTranscriptFiles(directoryPath: string, excludeDirs: string[] = []): string[] {
    const transcriptFiles: string[] = [];
    const excluded = new Set(excludeDirs.map(dir => path.resolve(dir)));

    function scanDirectory(dir: string) {
        const items = fs.readdirSync(dir, { withFileTypes: true });

        for (const item of items) {
            const fullPath = path.join(dir, item.name);

            if (item.isDirectory()) {
                if (!excluded.has(path.resolve(fullPath))) {
                    scanDirectory(fullPath);
                }
            } else if (item.isFile() && isTranscriptFile(item.name)) {
                transcriptFiles.push(fullPath);
            }
        }
    }

    scanDirectory(directoryPath);
    return transcriptFiles.sort();
}

/**
 * "exports/Chat with Ana.txt" -> "chat_with_ana"
 */
export function toOutputBaseName(filePath: string): string {
    const base = path.basename(filePath, path.extname(filePath));
    const slug = base
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/^_+|_+$/g, '');
    return slug || 'chat';
}

/**
 * Output names for a batch of transcripts, in the same order. Names that
 * slug alike get a numeric suffix: "chat_a", "chat_a_2", ...
 */
export function toUniqueOutputBaseNames(filePaths: string[]): string[] {
    const taken = new Set<string>();

    return filePaths.map(filePath => {
        const base = toOutputBaseName(filePath);
        let name = base;
        for (let n = 2; taken.has(name); n++) {
            name = `${base}_${n}`;
        }
        taken.add(name);
        return name;
    });
}
