import { CommandServerError, isClientError, toError } from '../errors.js';
import logger from '../utils/logger.js';
import type { IssueHandlers } from './handlers.js';
import {
  createIssueSchema,
  epicWithSubtasksSchema,
  getIssueSchema,
  getTransitionsSchema,
  myIssuesSchema,
  parseInput,
  searchIssuesSchema,
  updateIssueSchema,
} from './schemas.js';
import { type CommandName, type Envelope, failure, isCommandName, success } from './types.js';

function unreachable(command: never): never {
  throw new Error(`Unhandled command: ${String(command)}`);
}

/**
 * Entry point for every command. Resolves the command name, validates its
 * payload, runs the handler and wraps the outcome in an envelope.
 * `dispatch` never rejects.
 */
export class CommandRouter {
  constructor(private readonly handlers: IssueHandlers) {}

  async dispatch(command: unknown, data: unknown): Promise<Envelope> {
    if (typeof command !== 'string' || command.trim() === '') {
      return failure('No command specified');
    }
    if (!isCommandName(command)) {
      logger.warn(`Rejected unknown command: ${command}`);
      return failure(`Unknown command: ${command}`);
    }

    try {
      const result = await this.run(command, data ?? {});
      logger.debug(`Command ${command} succeeded`);
      return success(result);
    } catch (err) {
      const error = toError(err);
      if (isClientError(error)) {
        logger.warn(`Command ${command} rejected: ${error.message}`);
      } else {
        logger.error(`Command ${command} failed: ${error.message}`, {
          code: error instanceof CommandServerError ? error.code : undefined,
          stack: error.stack,
        });
      }
      return failure(error.message);
    }
  }

  private async run(command: CommandName, data: unknown): Promise<unknown> {
    switch (command) {
      case 'create_issue':
        return this.handlers.createIssue(parseInput(createIssueSchema, data));
      case 'get_issue':
        return this.handlers.getIssue(parseInput(getIssueSchema, data));
      case 'update_issue':
        return this.handlers.updateIssue(parseInput(updateIssueSchema, data));
      case 'search_issues':
        return this.handlers.searchIssues(parseInput(searchIssuesSchema, data));
      case 'get_epic_with_subtasks':
        return this.handlers.getEpicWithSubtasks(parseInput(epicWithSubtasksSchema, data));
      case 'get_my_issues':
        return this.handlers.getMyIssues(parseInput(myIssuesSchema, data));
      case 'get_transitions':
        return this.handlers.getTransitions(parseInput(getTransitionsSchema, data));
      default:
        return unreachable(command);
    }
  }
}
