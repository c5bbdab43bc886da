import { statSync } from 'node:fs';
import type { AgeReporter } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Age of a file-backed extract, from its modification time.
 */
export function fileAge(path: string, now: () => number = Date.now): AgeReporter {
    return {
        ageInDays: () => {
            try {
                return Math.floor((now() - statSync(path).mtimeMs) / DAY_MS);
            } catch {
                return null;
            }
        },
    };
}
