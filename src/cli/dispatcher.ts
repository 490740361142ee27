import type { RecordStore } from '../phonebook/index.js';
import { logger, type PhonebookError } from '../utils/index.js';
import {
  MESSAGES, isCommand, parseDeleteArgs, parseInsertArgs, parseListArgs, parseSearchArgs,
} from './args.js';
import { formatEntry, formatList } from './format.js';

export type Output = (line: string) => void;

const stdout: Output = line => console.log(line);

/**
 * Run one command. `args[0]` is the program name and `args[1]` the
 * subcommand. Every outcome, failures included, is written to `out`; nothing
 * is thrown for invalid input or store failures.
 */
export async function dispatch(args: readonly string[], store: RecordStore, out: Output = stdout): Promise<void> {
  if (args.length <= 1) {
    out(MESSAGES.missingArguments);
    return;
  }

  const command = args[1];
  if (!isCommand(command)) {
    out(MESSAGES.invalidOption);
    return;
  }

  const fail = (error: PhonebookError): void => {
    logger.debug(`${command} failed:`, error.name, error.message);
    out(error.message);
  };

  switch (command) {
    case 'search': {
      const term = parseSearchArgs(args);
      if (!term.ok) return out(term.error.message);

      const list = await store.getList();
      if (!list.ok) return fail(list.error);

      const match = store.search(list.value, term.value);
      if (!match.ok) return fail(match.error);

      out(formatEntry(match.value));
      return;
    }

    case 'list': {
      const valid = parseListArgs(args);
      if (!valid.ok) return out(valid.error.message);

      const list = await store.getList();
      if (!list.ok) return fail(list.error);

      for (const line of formatList(list.value)) out(line);
      return;
    }

    case 'insert': {
      const entry = parseInsertArgs(args);
      if (!entry.ok) return out(entry.error.message);

      const id = await store.insert(entry.value);
      if (!id.ok) return fail(id.error);

      out(`successfully inserted with id = ${id.value}`);
      return;
    }

    case 'delete': {
      const phoneNumber = parseDeleteArgs(args);
      if (!phoneNumber.ok) return out(phoneNumber.error.message);

      const deleted = await store.delete(phoneNumber.value);
      if (!deleted.ok) return fail(deleted.error);

      out('successfully deleted');
      return;
    }
  }
}
