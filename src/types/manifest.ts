/**
 * Subject label (e.g. "sub-01") to the files validated for that subject:
 * the subject's own files followed by the dataset's root-level files.
 */
export type SubjectManifest = Readonly<Record<string, readonly string[]>>;
