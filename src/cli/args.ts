import { z } from 'zod';
import type { NewEntry } from '../types/index.js';
import { ValidationError, ok, err, type Result } from '../utils/index.js';

export const MESSAGES = {
  missingArguments: 'Please enter required arguments!!',
  missingSearchTerm: 'Please provide a search term',
  invalidOption: 'not valid option',
} as const;

/** Full argument-vector length each subcommand takes, program name included. */
export const ARITY = {
  search: 3,
  list: 2,
  insert: 5,
  delete: 3,
} as const;

export type Command = keyof typeof ARITY;

export function isCommand(value: string): value is Command {
  return Object.hasOwn(ARITY, value);
}

const newEntrySchema = z.object({
  name: z.string().trim().min(1, 'name must not be empty'),
  surname: z.string().trim().min(1, 'surname must not be empty'),
  phoneNumber: z.string().trim().min(1, 'phone number must not be empty'),
});

function checkArity(command: Command, args: readonly string[]): ValidationError | null {
  const expected = ARITY[command];
  if (args.length < expected) return new ValidationError(`not enough arguments for ${command}`);
  if (args.length > expected) return new ValidationError(`too many arguments for ${command}`);
  return null;
}

export function parseSearchArgs(args: readonly string[]): Result<string, ValidationError> {
  if (args.length !== ARITY.search) return err(new ValidationError(MESSAGES.missingSearchTerm));
  return ok(args[2]);
}

export function parseListArgs(args: readonly string[]): Result<void, ValidationError> {
  const invalid = checkArity('list', args);
  return invalid ? err(invalid) : ok(undefined);
}

export function parseInsertArgs(args: readonly string[]): Result<NewEntry, ValidationError> {
  const invalid = checkArity('insert', args);
  if (invalid) return err(invalid);

  const parsed = newEntrySchema.safeParse({ name: args[2], surname: args[3], phoneNumber: args[4] });
  if (!parsed.success) {
    return err(new ValidationError(parsed.error.issues.map(issue => issue.message).join('; ')));
  }
  return ok(parsed.data);
}

export function parseDeleteArgs(args: readonly string[]): Result<string, ValidationError> {
  const invalid = checkArity('delete', args);
  if (invalid) return err(invalid);

  const phoneNumber = args[2].trim();
  if (!phoneNumber) return err(new ValidationError('phone number must not be empty'));
  return ok(phoneNumber);
}
