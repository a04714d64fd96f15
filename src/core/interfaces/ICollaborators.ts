/**
 * Uploaded document as received by a submission
 */
export interface UploadedDocument {
  filename: string;
  content: Buffer;
}

export interface PromptSelection {
  promptType: string;
  prompt?: string;
}

/**
 * Turns an uploaded document into plain text
 */
export interface ITextExtractor {
  extract(document: UploadedDocument): Promise<string>;
}

/**
 * Resolves a prompt type (or a caller-supplied prompt) into a template
 */
export interface IPromptResolver {
  resolve(selection: PromptSelection): Promise<string>;
}

/**
 * Removes side artifacts kept for a job. Must be idempotent.
 */
export interface IArtifactCleaner {
  readonly name: string;
  cleanup(jobId: string): Promise<void>;
}

/**
 * Keeps the uploaded document of a job until its cleanup
 */
export interface IArtifactStore extends IArtifactCleaner {
  save(jobId: string, document: UploadedDocument): Promise<string>;
}
