import Enquirer from 'enquirer';

export type PromptChoice<TValue extends string> = {
  value: TValue;
  name: string;
  description?: string;
};

export type PromptInputConfig = {
  message: string;
  default?: string;
  validate?: (value: string) => true | string;
};

export type PromptConfirmConfig = {
  message: string;
  default?: boolean;
};

export type PromptSelectConfig<TValue extends string> = {
  message: string;
  choices: Array<PromptChoice<TValue>>;
};

/**
 * Interactive questions asked by the wizard. Every method resolves to null
 * when the user cancels the prompt.
 */
export interface IPrompter {
  input(config: PromptInputConfig): Promise<string | null>;
  confirm(config: PromptConfirmConfig): Promise<boolean | null>;
  select<TValue extends string>(config: PromptSelectConfig<TValue>): Promise<TValue | null>;
}

type PromptResult<TValue> = {
  value: TValue;
};

const CANCEL_ERROR_NAMES = new Set(['CancelError', 'ExitPromptError', 'AbortError']);

// Enquirer rejects with an empty string when the prompt is closed with Ctrl+C
function isPromptCancelled(error: unknown): boolean {
  if (error === '' || error === undefined) {
    return true;
  }
  return error instanceof Error && CANCEL_ERROR_NAMES.has(error.name);
}

async function runPrompt<TValue>(run: () => Promise<PromptResult<TValue>>): Promise<TValue | null> {
  try {
    const result = await run();
    return result.value ?? null;
  } catch (error) {
    if (isPromptCancelled(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Terminal prompter backed by enquirer.
 */
export class EnquirerPrompter implements IPrompter {
  async input(config: PromptInputConfig): Promise<string | null> {
    const value = await runPrompt(() =>
      Enquirer.prompt<PromptResult<string>>({
        type: 'input',
        name: 'value',
        message: config.message,
        initial: config.default,
        validate: config.validate
      })
    );
    return value === null ? null : value.trim();
  }

  async confirm(config: PromptConfirmConfig): Promise<boolean | null> {
    return runPrompt(() =>
      Enquirer.prompt<PromptResult<boolean>>({
        type: 'confirm',
        name: 'value',
        message: config.message,
        initial: config.default
      })
    );
  }

  async select<TValue extends string>(config: PromptSelectConfig<TValue>): Promise<TValue | null> {
    const answer = await runPrompt(() =>
      Enquirer.prompt<PromptResult<string>>({
        type: 'select',
        name: 'value',
        message: config.message,
        choices: config.choices.map(choice => ({
          name: choice.value,
          message: choice.name,
          hint: choice.description
        }))
      })
    );
    return config.choices.find(choice => choice.value === answer)?.value ?? null;
  }
}
