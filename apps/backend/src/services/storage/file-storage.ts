/**
 * An uploaded file as handed over by the multipart parser (`req.file`).
 */
export interface IUploadedFile {
    buffer: Buffer;
    originalname: string;
    mimetype: string;
    size: number;
}

/**
 * Where a stored file ended up.
 */
export interface IStoredFile {
    /** Name of the file inside the storage directory. */
    filename: string;
    /** Filesystem path of the stored file. */
    path: string;
    /** Public URL the static middleware serves the file at. */
    url: string;
}

/**
 * Storage for uploaded files.
 *
 * The users and media modules write uploads through this interface so tests
 * can point them at a temporary directory, and a remote backend could replace
 * the local one without touching either module.
 */
export interface IFileStorage {
    /**
     * Create the storage location if needed.
     */
    prepare(): Promise<void>;

    /**
     * Write a file.
     *
     * @param file - File contents
     * @param filename - Name to store under, already unique and sanitized
     * @throws Error if the write fails (permissions, disk full, etc.)
     */
    save(file: Buffer, filename: string): Promise<IStoredFile>;

    /**
     * Remove a file.
     *
     * @param filename - Name returned by {@link save}
     * @returns True if the file was deleted, false if it was already missing
     */
    delete(filename: string): Promise<boolean>;

    /**
     * Whether files can currently be written.
     */
    isWritable(): Promise<boolean>;

    /**
     * Public URL of a stored file.
     */
    getUrl(filename: string): string;
}
