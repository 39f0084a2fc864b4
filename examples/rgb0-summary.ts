import {statSync} from 'fs';
import {basename} from 'path';

import {formatSummary, readRgb0File} from '../src';

const isFile = (path: string): boolean => {
    try {
        return statSync(path).isFile();
    } catch {
        return false;
    }
};

const paths = process.argv.slice(2);
if (paths.length === 0) paths.push('temp.RGB');

paths.forEach((path, i) => {
    if (!isFile(path)) {
        console.log(`${path} missing or not a file, skipping`);
        return;
    }
    for (const line of formatSummary(basename(path), readRgb0File(path))) {
        console.log(line);
    }
    if (i !== paths.length - 1) console.log('');
});
