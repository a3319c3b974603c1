import * as path from 'path';
import { getErrorMessage } from './errors';
import { NodeFileSystem } from './interfaces/fs-interface';
import { AxiosHttpClient } from './interfaces/http-interface';
import { CliProgressBarFactory } from './ui';
import { DownloadOptions, Progress } from './models';

function parseContentLength(value: unknown): number {
    const length = typeof value === 'string' || typeof value === 'number' ? Number(value) : 0;
    return Number.isFinite(length) && length > 0 ? length : 0;
}

/**
 * Low-level function to download a file from a URL
 */
export async function downloadFile(
    url: string,
    outputPath: string,
    options: DownloadOptions = {},
): Promise<void> {
    const fs = options.fileSystem || new NodeFileSystem();
    const http = options.httpClient || new AxiosHttpClient();
    const onProgress = options.onProgress;

    const dir = path.dirname(outputPath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }

    const response = await http.request<NodeJS.ReadableStream>({
        method: 'GET',
        url: url,
        responseType: 'stream',
        ...(options.timeoutSeconds ? { timeout: options.timeoutSeconds * 1000 } : {}),
    });

    const totalLength = parseContentLength(response.headers['content-length']);
    let downloadLength = 0;

    const writer = fs.createWriteStream(outputPath);
    const stream = response.data;

    return new Promise((resolve, reject) => {
        stream.on('data', (chunk: Buffer) => {
            downloadLength += chunk.length;
            onProgress?.({ loaded: downloadLength, total: totalLength });
        });
        stream.on('end', () => {
            onProgress?.({ loaded: downloadLength, total: totalLength || downloadLength });
        });
        let failed = false;
        const fail = (error: Error) => {
            if (failed) return;
            failed = true;
            const cleanUp = () => {
                try {
                    if (fs.existsSync(outputPath)) {
                        fs.unlinkSync(outputPath);
                    }
                } catch (cleanupError) {
                    reject(new Error(`${error.message}; removing partial file ${outputPath} failed: ${getErrorMessage(cleanupError)}`));
                    return;
                }
                reject(error);
            };
            if (writer.closed) {
                cleanUp();
            } else {
                writer.once('close', cleanUp);
                writer.destroy();
            }
        };

        stream.on('error', fail);
        writer.on('finish', () => resolve());
        writer.on('error', fail);
        stream.pipe(writer);
    });
}

/**
 * Downloads one file behind a labelled progress bar
 */
export async function downloadWithProgress(
    name: string,
    url: string,
    outputPath: string,
    options: DownloadOptions = {},
): Promise<void> {
    const factory = options.progressBarFactory || new CliProgressBarFactory();
    const multibar = factory.createMultiBar({});
    const bar = multibar.create(0, 0, { name });

    try {
        await downloadFile(url, outputPath, {
            ...options,
            onProgress: (progress: Progress) => {
                if (progress.total > 0) {
                    bar.setTotal(progress.total);
                    bar.update(progress.loaded);
                }
                options.onProgress?.(progress);
            },
        });
    } finally {
        bar.stop();
        multibar.stop();
    }
}
