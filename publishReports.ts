import fs from 'fs';
import path from 'path';
import { DataFileError, errorMessage } from './errors';
import { getLogger } from './logger';

const log = getLogger('publish');

const KEEP = new Set(['README.md']);

function isInside(parent: string, child: string): boolean {
    const rel = path.relative(parent, child);
    return rel === '' || (rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel));
}

/**
 * Replaces the contents of the publish folder with the generated reports.
 * A top-level README.md in the publish folder is left in place. The publish
 * folder may not overlap the reports folder or any of `protectedDirs`; that is
 * checked before anything is removed.
 */
export function publishReports(reportsDir: string, publishDir: string, protectedDirs: string[] = []): number {
    const from = path.resolve(reportsDir);
    const to = path.resolve(publishDir);
    for (const dir of [from, ...protectedDirs.map(d => path.resolve(d))]) {
        if (isInside(dir, to) || isInside(to, dir)) {
            throw new DataFileError(`Publish folder ${to} overlaps ${dir}; choose a separate folder`, to);
        }
    }
    if (!fs.existsSync(from) || !fs.statSync(from).isDirectory()) {
        throw new DataFileError(`No reports found at ${from}; generate the reports first`, from);
    }

    try {
        fs.mkdirSync(to, { recursive: true });
        for (const name of fs.readdirSync(to)) {
            if (KEEP.has(name)) continue;
            fs.rmSync(path.join(to, name), { recursive: true, force: true });
        }

        const entries = fs.readdirSync(from);
        for (const name of entries) {
            fs.cpSync(path.join(from, name), path.join(to, name), { recursive: true });
        }
        log.info(`Copied ${entries.length} item(s) from ${from} to ${to}`);
        return entries.length;
    } catch (err) {
        throw new DataFileError(`Could not publish to ${to}: ${errorMessage(err)}`, to);
    }
}
