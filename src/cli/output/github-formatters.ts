/**
 * Terminal formatting helpers for GitHub resources.
 */

import type { Gist, GitHubUser, Issue, Notification, Repository, Workflow } from '../../github/types.js';
import { dim, symbols } from '../output.js';

export function formatRepositoryLine(repo: Repository): string {
  const visibility = repo.private ? 'private' : 'public ';
  return `${visibility} - ${repo.full_name}`;
}

export function formatWorkflowLine(workflow: Workflow): string {
  const status = workflow.state === 'active' ? symbols.success() : symbols.warning();
  return `${status} ${workflow.name} (ID: ${workflow.id})`;
}

export function formatGistLine(gist: Gist): string {
  const visibility = gist.public ? 'public' : 'secret';
  const description = gist.description || '(no description)';
  return `${visibility} - ${description} ${dim(`(${gist.html_url})`)}`;
}

export function formatNotificationLine(notification: Notification): string {
  return `${notification.repository.full_name}: ${notification.subject.title} (${notification.reason})`;
}

export function formatIssueLine(issue: Issue): string {
  return `#${issue.number}: ${issue.title} (${issue.state})`;
}

/**
 * Labelled profile fields in display order. Missing values show as N/A.
 */
export function userProfileFields(user: GitHubUser): Array<[string, string | number]> {
  return [
    ['Username', user.login],
    ['Name', user.name ?? 'N/A'],
    ['Email', user.email ?? 'N/A'],
    ['Bio', user.bio ?? 'N/A'],
    ['Public Repos', user.public_repos],
    ['Followers', user.followers],
    ['Following', user.following],
  ];
}
