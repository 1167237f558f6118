/**
 * Shared type definitions for the index builder
 */

/** One downloadable archive, as listed by a release source */
export interface ManifestEntry {
  /** Archive filename (e.g., 'cpython-3.12.10+20250409-x86_64-unknown-linux-gnu-install_only.tar.gz') */
  filename: string;
  /** Absolute download URL of the archive */
  download_url: string;
}

/** The subset of python-build-standalone's manifest.json the builder reads */
export interface Manifest {
  files: ManifestEntry[];
}

/** Contents of index.json: full version ('3.12.10') → download URL */
export type VersionIndex = Record<string, string>;

/** Where the builder reads the list of archives from */
export type IndexSource = "manifest" | "html";
