import { editor, input, select } from '@inquirer/prompts';

export interface InputQuestion {
  message: string;
  default?: string;
  /** Returns true when the answer is accepted, or the message to show otherwise */
  validate?: (value: string) => true | string;
}

export interface SelectQuestion<T extends string> {
  message: string;
  choices: readonly T[];
  default?: T;
}

export interface EditorQuestion {
  message: string;
  default: string;
  /** Temp file extension, so the editor picks the right syntax */
  postfix?: string;
}

/**
 * "Ask the user for field X with default D".
 * Commands depend on this interface only, so tests can answer with fakes.
 */
export interface Prompter {
  input(question: InputQuestion): Promise<string>;
  select<T extends string>(question: SelectQuestion<T>): Promise<T>;
  editor(question: EditorQuestion): Promise<string>;
}

class InquirerPrompter implements Prompter {
  async input({ message, default: defaultValue, validate }: InputQuestion): Promise<string> {
    const value = await input({
      message,
      default: defaultValue,
      validate: validate ? (answer: string) => validate(answer.trim()) : undefined,
    });
    return value.trim();
  }

  async select<T extends string>({
    message,
    choices,
    default: defaultValue,
  }: SelectQuestion<T>): Promise<T> {
    return select<T>({
      message,
      choices: choices.map((value) => ({ value })),
      default: defaultValue,
    });
  }

  async editor({ message, default: defaultValue, postfix }: EditorQuestion): Promise<string> {
    return editor({ message, default: defaultValue, postfix });
  }
}

export function createPrompter(): Prompter {
  return new InquirerPrompter();
}
