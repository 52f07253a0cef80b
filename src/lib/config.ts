/**
 * Tracker connection settings from the environment, asking for what is missing
 */

import inquirer from 'inquirer';
import { JiraCredentials } from './jira-client';

export interface TicketTarget {
  key: string;
  /** Server parsed from a browse URL, if one was given */
  server?: string;
}

export type CredentialPrompt = (missing: Array<keyof JiraCredentials>) => Promise<CredentialAnswers>;

type CredentialAnswers = {
  server?: string;
  username?: string;
  token?: string;
};

const CREDENTIAL_NAMES: Array<keyof JiraCredentials> = ['server', 'username', 'token'];

const PROMPT_MESSAGES: Record<keyof JiraCredentials, string> = {
  server: 'Jira server URL:',
  username: 'Jira username:',
  token: 'Jira API token:',
};

/**
 * Accept either a ticket key (`proj-12`) or a browse URL
 * (`https://jira.example.com/browse/PROJ-12`)
 */
export function parseTicketTarget(target: string): TicketTarget {
  const match = target.match(/^(https?:\/\/.+?)\/browse\/([^/?#]+)/i);
  if (match) {
    return { server: match[1], key: match[2].toUpperCase() };
  }
  return { key: target.toUpperCase() };
}

export const promptForCredentials: CredentialPrompt = async (missing) => {
  return inquirer.prompt<CredentialAnswers>(
    missing.map((name): inquirer.DistinctQuestion<CredentialAnswers> =>
      name === 'token'
        ? { type: 'password', name, message: PROMPT_MESSAGES[name], mask: '*' }
        : { type: 'input', name, message: PROMPT_MESSAGES[name] }
    )
  );
};

/**
 * Resolve credentials from JIRA_SERVER, JIRA_USERNAME and JIRA_TOKEN; an
 * explicit server overrides the environment
 */
export async function resolveJiraCredentials(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { server?: string } = {},
  prompt: CredentialPrompt = promptForCredentials
): Promise<JiraCredentials> {
  const known: CredentialAnswers = {
    server: overrides.server || env.JIRA_SERVER || undefined,
    username: env.JIRA_USERNAME || undefined,
    token: env.JIRA_TOKEN || undefined,
  };

  const missing = CREDENTIAL_NAMES.filter((name) => !known[name]);
  const answered: CredentialAnswers = missing.length > 0 ? await prompt(missing) : {};

  const server = known.server ?? answered.server;
  const username = known.username ?? answered.username;
  const token = known.token ?? answered.token;

  if (!server || !username || !token) {
    throw new Error('Jira server, username and token are all required');
  }

  return { server, username, token };
}

/**
 * Credentials from the environment only; throws when any is missing
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): JiraCredentials {
  const { JIRA_SERVER: server, JIRA_USERNAME: username, JIRA_TOKEN: token } = env;
  if (!server || !username || !token) {
    throw new Error('Set JIRA_SERVER, JIRA_USERNAME and JIRA_TOKEN to reach the tracker');
  }
  return { server, username, token };
}
