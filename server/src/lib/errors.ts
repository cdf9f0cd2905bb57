/**
 * Raised when a required collaborator (model endpoint, API key) is not
 * configured. Fatal to the session that needed it.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised at the operation boundary when the arguments chosen by the model do
 * not match what the operation accepts.
 */
export class ToolArgumentError extends Error {
  readonly toolName: string;
  readonly issues: string[];

  constructor(toolName: string, issues: string[]) {
    super(`Invalid arguments for ${toolName}: ${issues.join('; ')}`);
    this.name = 'ToolArgumentError';
    this.toolName = toolName;
    this.issues = issues;
  }
}

/** Non-2xx answer from a language-model provider. */
export class ProviderHTTPError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} API error ${status}: ${body.slice(0, 500)}`);
    this.name = 'ProviderHTTPError';
    this.status = status;
    this.body = body;
  }
}
