export type Command =
  | { type: 'empty' }
  | { type: 'status' }
  | { type: 'guess'; participant: string; time: string }
  | { type: 'reveal'; time: string }
  | { type: 'reset' }
  | { type: 'board' }
  | { type: 'history' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; message: string };

export const HELP_TEXT = [
  'Commands:',
  '  status                 Show today\'s guesses and results',
  '  guess <name> <HH:MM>   Submit a guess',
  '  reveal <HH:MM>         Record the actual leave time',
  '  reset                  Clear today\'s guesses and actual time',
  '  board                  Show the overall leaderboard',
  '  history                Show every scored day',
  '  help                   Show this help',
  '  quit                   Exit',
].join('\n');

export function parseCommand(line: string): Command {
  const [keyword, ...args] = line.trim().split(/\s+/).filter(part => part.length > 0);

  switch (keyword?.toLowerCase()) {
    case undefined:
      return { type: 'empty' };

    case 'status':
      return { type: 'status' };

    case 'guess': {
      // Names may contain spaces, the time is always the last word
      const time = args[args.length - 1];
      if (args.length < 2 || time === undefined) {
        return { type: 'invalid', message: 'Usage: guess <name> <HH:MM>' };
      }
      return { type: 'guess', participant: args.slice(0, -1).join(' '), time };
    }

    case 'reveal': {
      const [time] = args;
      if (args.length !== 1 || time === undefined) {
        return { type: 'invalid', message: 'Usage: reveal <HH:MM>' };
      }
      return { type: 'reveal', time };
    }

    case 'reset':
      return { type: 'reset' };

    case 'board':
    case 'leaderboard':
      return { type: 'board' };

    case 'history':
      return { type: 'history' };

    case 'help':
    case '?':
      return { type: 'help' };

    case 'quit':
    case 'exit':
      return { type: 'quit' };

    default:
      return { type: 'invalid', message: `Unknown command "${keyword}". Type "help" for a list.` };
  }
}
