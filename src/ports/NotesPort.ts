export type PatchTargetType = 'heading' | 'block' | 'frontmatter';

export type PatchOperation = 'append' | 'prepend' | 'replace';

export interface PatchContentParams {
  path: string;
  targetType: PatchTargetType;
  /** Heading text, block reference or frontmatter field, depending on targetType. */
  target: string;
  operation: PatchOperation;
  content: string;
}

/** Vault operations of the note-taking application, addressed by vault-relative path. */
export interface NoteServicePort {
  /** Resolves to null when the note does not exist. */
  getFileContents(path: string): Promise<string | null>;
  /** Appends to the end of a note, creating it when missing. */
  appendContent(path: string, content: string): Promise<void>;
  patchContent(params: PatchContentParams): Promise<void>;
}

export interface NoteSession extends NoteServicePort {
  connect(): Promise<void>;
  close(): Promise<void>;
}
