export interface SourceScanner {
  /** Number of files `scan` will visit; sizes the progress display. */
  countFiles(directory: string): Promise<number>;
  scan(directory: string, onFileScanned?: () => void): Promise<string[]>;
}
