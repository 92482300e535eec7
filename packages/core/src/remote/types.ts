/** A single entry returned by the remote source. Immutable per listing call. */
export interface RemoteEntry {
  path: string;
  size: number;
  /** 64-char lowercase hex content hash, when the remote knows it */
  contentHash?: string;
  modified?: string; // ISO 8601, informational only
  isFile: boolean;
}

/** Result of listing a folder from scratch */
export interface ListResult {
  entries: RemoteEntry[];
  cursor: string;
}

/** One page of a cursor continuation */
export interface ListPage {
  entries: RemoteEntry[];
  hasMore: boolean;
  cursor: string;
}

/** Changes accumulated across every page following a cursor */
export interface ChangeSet {
  entries: RemoteEntry[];
  /** Terminal cursor after the last page */
  cursor: string;
}

export interface RemoteSource {
  /** List every entry under root, following pagination to the end. */
  list(root: string, recursive: boolean): Promise<ListResult>;

  /** Fetch the page that follows a cursor. */
  listContinue(cursor: string): Promise<ListPage>;

  /** All entries changed since cursor, paginating until hasMore is false. */
  changesSince(cursor: string): Promise<ChangeSet>;

  /** Download a remote file to localPath, creating parent directories. */
  download(remotePath: string, localPath: string): Promise<void>;

  /** The account the credential belongs to. */
  getCurrentAccount(): Promise<AccountInfo>;
}

export interface AccountInfo {
  accountId: string;
  email: string;
  displayName: string;
}

/** Supplies a bearer credential on demand. Refresh is the provider's concern. */
export interface TokenProvider {
  getAccessToken(): Promise<string>;
}
