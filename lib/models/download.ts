import { IFileSystem, IHttpClient, IProgressBarFactory } from '../interfaces';

/** Bytes received so far; total is 0 until the length is known */
export type Progress = {
    loaded: number;
    total: number;
}

export type DownloadOptions = {
    onProgress?: (progress: Progress) => void;
    /** Request timeout; omitted means no limit */
    timeoutSeconds?: number;
    fileSystem?: IFileSystem;
    httpClient?: IHttpClient;
    progressBarFactory?: IProgressBarFactory;
}
