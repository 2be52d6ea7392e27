import { GitRepository, type RepositoryContext } from '@shiplog/git';

/**
 * Repository context for the working directory
 *
 * @throws ConfigurationError outside a git working tree
 */
export function openRepository(cwd: string = process.cwd()): RepositoryContext {
  return GitRepository.open(cwd);
}
