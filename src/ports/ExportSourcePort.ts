export interface ExportFile {
  /** File name including extension, e.g. "20240315_0930.txt". */
  name: string;
  path: string;
  modifiedAt: Date;
}

export interface ExportSourcePort {
  /** Exports that have not been marked processed yet, in name order. */
  listPending(): Promise<ExportFile[]>;
  read(file: ExportFile): Promise<string>;
  markProcessed(file: ExportFile): Promise<void>;
}
