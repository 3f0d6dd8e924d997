import type { AppContext } from '../../app-context';
import type { CliIO } from '../utils/terminal';

/**
 * What every command handler receives. The application context is built
 * on first use, so `--help` never opens the database.
 */
export interface CommandRuntime {
  io: CliIO;
  context(): AppContext;
}
