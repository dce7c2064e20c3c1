import type { Repository } from '../types/index.js';

// GitHub owner and repository names: alphanumerics, hyphen, underscore, dot
const NAME_PATTERN = /^[a-zA-Z0-9._-]+$/;

function validateComponent(component: string, componentType: 'owner' | 'repo'): string {
  if (!component) {
    throw new Error(`Invalid repository ${componentType}: cannot be empty`);
  }

  if (!NAME_PATTERN.test(component) || component.includes('..')) {
    throw new Error(
      `Invalid repository ${componentType} "${component}": must contain only alphanumeric characters, hyphens, underscores, and dots`,
    );
  }

  if (component.startsWith('.') || component.endsWith('.')) {
    throw new Error(
      `Invalid repository ${componentType} "${component}": cannot start or end with a dot`,
    );
  }

  return component;
}

/**
 * Parse `owner/repo`, an https URL (github.com or an Enterprise host) or an SSH remote.
 */
export function parseRepository(repoString: string): Repository {
  const trimmed = repoString.trim();

  const urlPatterns = [
    /^https?:\/\/[^/]+\/([^/]+)\/([^/\s]+?)(?:\.git)?\/?$/,
    /^git@[^:]+:([^/]+)\/([^/\s]+?)(?:\.git)?$/,
  ];

  for (const pattern of urlPatterns) {
    const match = trimmed.match(pattern);
    if (match?.[1] && match[2]) {
      let owner: string;
      let repo: string;
      try {
        owner = decodeURIComponent(match[1]);
        repo = decodeURIComponent(match[2]);
      } catch {
        throw new Error('Invalid repository URL: malformed URL encoding');
      }
      return { owner: validateComponent(owner, 'owner'), repo: validateComponent(repo, 'repo') };
    }
  }

  const parts = trimmed.split('/');
  if (parts.length === 2 && parts[0] && parts[1]) {
    return {
      owner: validateComponent(parts[0], 'owner'),
      repo: validateComponent(parts[1], 'repo'),
    };
  }

  throw new Error(
    `Invalid repository format: ${repoString}\n` +
      `Expected formats:\n` +
      `  - owner/repo\n` +
      `  - https://github.com/owner/repo\n` +
      `  - git@github.com:owner/repo.git`,
  );
}

export function stringifyRepository(repo: Repository): string {
  return `${repo.owner}/${repo.repo}`;
}

/**
 * Web URL the runner's config.sh registers against
 */
export function repositoryUrl(serverUrl: string, repo: Repository): string {
  return `${serverUrl.replace(/\/+$/, '')}/${repo.owner}/${repo.repo}`;
}
