/**
 * GitHub REST resource types.
 *
 * Only the fields octoterm reads are declared; responses carry many more.
 */

// ============================================================================
// Account
// ============================================================================

/**
 * The authenticated user (`GET /user`).
 */
export interface GitHubUser {
  login: string;
  id: number;
  name: string | null;
  email: string | null;
  bio: string | null;
  public_repos: number;
  followers: number;
  following: number;
  html_url: string;
}

// ============================================================================
// Repositories & contents
// ============================================================================

export interface Repository {
  id: number;
  name: string;
  full_name: string;
  private: boolean;
  html_url: string;
  description: string | null;
  default_branch: string;
}

export interface CreateRepositoryInput {
  name: string;
  private?: boolean;
  description?: string;
  /** Create an initial commit with a README */
  autoInit?: boolean;
  /** Replace the generated README with this content (requires autoInit) */
  readme?: string;
}

/**
 * A file entry from the contents API.
 */
export interface ContentFile {
  type: 'file';
  name: string;
  path: string;
  sha: string;
  size: number;
  /** base64, possibly wrapped with newlines */
  content: string;
  encoding: string;
  html_url: string;
}

/**
 * Result of creating or updating a file.
 */
export interface ContentUpdate {
  content: {
    name: string;
    path: string;
    sha: string;
    html_url: string;
  };
  commit: {
    sha: string;
    message: string;
  };
}

export interface PutFileInput {
  repo: string;
  path: string;
  content: Buffer | string;
  message: string;
  branch?: string;
}

/**
 * A downloaded file with its decoded bytes.
 */
export interface DownloadedFile {
  path: string;
  sha: string;
  size: number;
  data: Buffer;
}

// ============================================================================
// Actions
// ============================================================================

export interface Workflow {
  id: number;
  name: string;
  path: string;
  state: string;
}

export interface WorkflowList {
  total_count: number;
  workflows: Workflow[];
}

// ============================================================================
// Gists
// ============================================================================

export interface Gist {
  id: string;
  description: string | null;
  public: boolean;
  html_url: string;
  files: Record<string, { filename: string; size: number }>;
}

export interface CreateGistInput {
  description: string;
  public: boolean;
  /** File name -> content */
  files: Record<string, string>;
}

// ============================================================================
// Notifications
// ============================================================================

export interface Notification {
  id: string;
  reason: string;
  unread: boolean;
  subject: {
    title: string;
    type: string;
  };
  repository: {
    full_name: string;
  };
}

// ============================================================================
// Issues
// ============================================================================

export type IssueState = 'open' | 'closed' | 'all';

export interface Issue {
  number: number;
  title: string;
  state: 'open' | 'closed';
  html_url: string;
  body: string | null;
}

export interface CreateIssueInput {
  title: string;
  body?: string;
}
