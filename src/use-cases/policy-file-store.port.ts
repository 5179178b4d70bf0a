export interface PolicyFileStore {
    /**
     * Returns the path of `fileName` in `startDir` or the nearest parent
     * directory that contains it.
     */
    locateUpward(startDir: string, fileName: string): Promise<string | undefined>;
    /** Returns `undefined` when the file does not exist. */
    readText(path: string): Promise<string | undefined>;
}
