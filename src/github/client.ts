/**
 * GitHub account operations over an authenticated session.
 *
 * Repository-scoped calls use the session identity as the owner. Reads go
 * through the session's idempotent retry; writes are attempted once unless
 * the caller passes `{ allowRetry: true }` after confirming the repeat.
 */

import { GITHUB, TIMEOUTS } from '../constants.js';
import { OctotermError, RemoteError, UnauthorizedError, wrapError } from '../errors/types.js';
import { getLogger, type Logger } from '../logging/logger.js';
import type { ApiSession } from '../session/session.js';
import { encodePath } from '../utils/network.js';
import { sleep } from '../utils/timeout.js';
import type {
  ContentFile,
  ContentUpdate,
  CreateGistInput,
  CreateIssueInput,
  CreateRepositoryInput,
  DownloadedFile,
  Gist,
  GitHubUser,
  Issue,
  IssueState,
  Notification,
  PutFileInput,
  Repository,
  Workflow,
  WorkflowList,
} from './types.js';

/**
 * Client options.
 */
export interface GitHubClientOptions {
  /** Wait after auto-initializing a repository before rewriting its README */
  readmeInitDelayMs?: number;
  logger?: Logger;
}

/**
 * Options for mutating calls.
 */
export interface MutationOptions {
  /** Operator confirmed that repeating the call on a network failure is acceptable */
  allowRetry?: boolean;
}

/**
 * Result of creating a repository.
 */
export interface CreatedRepository {
  repository: Repository;
  /** Set when custom README content replaced the generated one */
  readme?: ContentUpdate;
  /** Set when the repository exists but the README could not be replaced */
  readmeError?: OctotermError;
}

function isContentFile(value: unknown): value is ContentFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'type' in value &&
    value.type === 'file' &&
    'content' in value &&
    typeof value.content === 'string'
  );
}

export class GitHubClient {
  private readonly session: ApiSession;
  private readonly readmeInitDelayMs: number;
  private readonly logger: Logger;

  constructor(session: ApiSession, options: GitHubClientOptions = {}) {
    this.session = session;
    this.readmeInitDelayMs = options.readmeInitDelayMs ?? TIMEOUTS.README_INIT_DELAY;
    this.logger = options.logger ?? getLogger('github');
  }

  /**
   * Owner used for repository paths.
   */
  get owner(): string {
    return this.session.identity;
  }

  // ==========================================================================
  // User
  // ==========================================================================

  async getAuthenticatedUser(): Promise<GitHubUser> {
    const response = await this.session.send<GitHubUser>('GET', '/user');
    return response.data;
  }

  /**
   * Confirm the token works and report the account it belongs to.
   * A login that differs from the supplied username is logged, not rejected.
   */
  async verifyCredentials(): Promise<GitHubUser> {
    const user = await this.getAuthenticatedUser();
    if (user.login.toLowerCase() !== this.owner.toLowerCase()) {
      this.logger.warn(
        { identity: this.owner, login: user.login },
        'Token belongs to a different account than the supplied username'
      );
    }
    return user;
  }

  // ==========================================================================
  // Repositories
  // ==========================================================================

  async listRepositories(): Promise<Repository[]> {
    const response = await this.session.send<Repository[]>('GET', '/user/repos', undefined, {
      query: { per_page: GITHUB.PER_PAGE },
    });
    return response.data;
  }

  async createRepository(
    input: CreateRepositoryInput,
    options: MutationOptions = {}
  ): Promise<CreatedRepository> {
    const autoInit = input.autoInit ?? true;
    const response = await this.session.send<Repository>(
      'POST',
      '/user/repos',
      {
        name: input.name,
        private: input.private ?? false,
        description: input.description ?? '',
        auto_init: autoInit,
      },
      options
    );
    const repository = response.data;

    if (!autoInit || input.readme === undefined) {
      return { repository };
    }

    try {
      const readme = await this.replaceReadme(repository, input.readme, options);
      return { repository, readme };
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        throw error;
      }
      const readmeError = wrapError(error, { operation: 'replace README' });
      this.logger.warn(
        { repo: repository.full_name, code: readmeError.code },
        'Repository created but README was not replaced'
      );
      return { repository, readmeError };
    }
  }

  /**
   * Overwrite the README.md on the repository's default branch.
   */
  async replaceReadme(
    repository: Repository,
    content: string,
    options: MutationOptions = {}
  ): Promise<ContentUpdate> {
    // The initial commit lands asynchronously after creation
    if (this.readmeInitDelayMs > 0) {
      await sleep(this.readmeInitDelayMs);
    }
    return this.putFile(
      {
        repo: repository.name,
        path: 'README.md',
        content,
        message: 'Update README.md',
        branch: repository.default_branch || GITHUB.DEFAULT_BRANCH,
      },
      options
    );
  }

  async deleteRepository(name: string, options: MutationOptions = {}): Promise<void> {
    await this.session.send('DELETE', this.repoPath(name), undefined, options);
  }

  // ==========================================================================
  // Contents
  // ==========================================================================

  /**
   * Blob sha of a file, or undefined when it does not exist.
   */
  async getFileSha(repo: string, path: string, ref?: string): Promise<string | undefined> {
    try {
      const response = await this.session.send<unknown>(
        'GET',
        `${this.repoPath(repo)}/contents/${encodePath(path)}`,
        undefined,
        { query: { ref } }
      );
      return isContentFile(response.data) ? response.data.sha : undefined;
    } catch (error) {
      if (error instanceof RemoteError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Create or update a file. Updates send the current sha, as GitHub requires.
   */
  async putFile(input: PutFileInput, options: MutationOptions = {}): Promise<ContentUpdate> {
    const branch = input.branch ?? GITHUB.DEFAULT_BRANCH;
    const sha = await this.getFileSha(input.repo, input.path, branch);
    const bytes = typeof input.content === 'string' ? Buffer.from(input.content, 'utf8') : input.content;

    this.logger.debug(
      { repo: input.repo, path: input.path, branch, update: sha !== undefined },
      'Writing file'
    );

    const response = await this.session.send<ContentUpdate>(
      'PUT',
      `${this.repoPath(input.repo)}/contents/${encodePath(input.path)}`,
      {
        message: input.message,
        content: bytes.toString('base64'),
        branch,
        ...(sha !== undefined ? { sha } : {}),
      },
      options
    );
    return response.data;
  }

  /**
   * Download a file and decode its content.
   */
  async getFile(repo: string, path: string, ref?: string): Promise<DownloadedFile> {
    const response = await this.session.send<unknown>(
      'GET',
      `${this.repoPath(repo)}/contents/${encodePath(path)}`,
      undefined,
      { query: { ref } }
    );
    const file = response.data;
    if (!isContentFile(file)) {
      throw new OctotermError(`${path} is not a file in ${this.owner}/${repo}`, {
        code: 'NOT_A_FILE',
        severity: 'low',
        retryable: 'terminal',
        context: { operation: 'getFile', path },
      });
    }
    return {
      path: file.path,
      sha: file.sha,
      size: file.size,
      data: Buffer.from(file.content, 'base64'),
    };
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  async listWorkflows(repo: string): Promise<Workflow[]> {
    const response = await this.session.send<WorkflowList>(
      'GET',
      `${this.repoPath(repo)}/actions/workflows`
    );
    return response.data.workflows;
  }

  /**
   * Dispatch a workflow run. The workflow id may be numeric or the file name.
   */
  async triggerWorkflow(
    repo: string,
    workflowId: string | number,
    ref: string = GITHUB.DEFAULT_BRANCH,
    options: MutationOptions = {}
  ): Promise<void> {
    await this.session.send(
      'POST',
      `${this.repoPath(repo)}/actions/workflows/${encodeURIComponent(String(workflowId))}/dispatches`,
      { ref },
      options
    );
  }

  // ==========================================================================
  // Gists
  // ==========================================================================

  async createGist(input: CreateGistInput, options: MutationOptions = {}): Promise<Gist> {
    const files: Record<string, { content: string }> = {};
    for (const [name, content] of Object.entries(input.files)) {
      files[name] = { content };
    }
    const response = await this.session.send<Gist>(
      'POST',
      '/gists',
      { description: input.description, public: input.public, files },
      options
    );
    return response.data;
  }

  async listGists(): Promise<Gist[]> {
    const response = await this.session.send<Gist[]>('GET', '/gists');
    return response.data;
  }

  // ==========================================================================
  // Notifications
  // ==========================================================================

  async listNotifications(): Promise<Notification[]> {
    const response = await this.session.send<Notification[]>('GET', '/notifications');
    return response.data;
  }

  async markNotificationsRead(options: MutationOptions = {}): Promise<void> {
    await this.session.send('PUT', '/notifications', {}, options);
  }

  // ==========================================================================
  // Issues
  // ==========================================================================

  async createIssue(
    repo: string,
    input: CreateIssueInput,
    options: MutationOptions = {}
  ): Promise<Issue> {
    const response = await this.session.send<Issue>(
      'POST',
      `${this.repoPath(repo)}/issues`,
      { title: input.title, body: input.body ?? '' },
      options
    );
    return response.data;
  }

  async listIssues(repo: string, state: IssueState = 'open'): Promise<Issue[]> {
    const response = await this.session.send<Issue[]>(
      'GET',
      `${this.repoPath(repo)}/issues`,
      undefined,
      { query: { state } }
    );
    return response.data;
  }

  private repoPath(repo: string): string {
    return `/repos/${encodeURIComponent(this.owner)}/${encodeURIComponent(repo)}`;
  }
}
