import * as yauzl from 'yauzl';

export interface ArchiveEntry {
    name: string;
    content: Buffer;
}

export interface ArchiveContents {
    entries: ArchiveEntry[];
    skipped: string[]; // entries not accepted by the filter, e.g. attachments
}

const LOCAL_FILE_HEADER = 0x04034b50;

export function isZipArchive(buffer: Buffer): boolean {
    return buffer.length >= 4 && buffer.readUInt32LE(0) === LOCAL_FILE_HEADER;
}

/**
 * Reads the entries of a zip archive held in memory. Only entries accepted by
 * `accept` are decompressed; directories are ignored.
 */
export function readArchive(buffer: Buffer, accept: (name: string) => boolean): Promise<ArchiveContents> {
    return new Promise((resolve, reject) => {
        yauzl.fromBuffer(buffer, { lazyEntries: true }, (openError, zipfile) => {
            if (openError || !zipfile) {
                reject(openError ?? new Error('Unable to open zip archive'));
                return;
            }

            const contents: ArchiveContents = { entries: [], skipped: [] };
            zipfile.on('error', reject);
            zipfile.on('end', () => resolve(contents));
            zipfile.on('entry', (entry: yauzl.Entry) => {
                if (entry.fileName.endsWith('/')) {
                    zipfile.readEntry();
                    return;
                }
                if (!accept(entry.fileName)) {
                    contents.skipped.push(entry.fileName);
                    zipfile.readEntry();
                    return;
                }
                zipfile.openReadStream(entry, (streamError, stream) => {
                    if (streamError || !stream) {
                        reject(streamError ?? new Error(`Unable to read ${entry.fileName}`));
                        return;
                    }
                    const chunks: Buffer[] = [];
                    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
                    stream.on('error', reject);
                    stream.on('end', () => {
                        contents.entries.push({ name: entry.fileName, content: Buffer.concat(chunks) });
                        zipfile.readEntry();
                    });
                });
            });
            zipfile.readEntry();
        });
    });
}
