import { Command, Errors, Flags } from '@oclif/core';
import chalk from 'chalk';
import dotenv from 'dotenv';
import AppConfig from './app-config/config';
import AppService from './app-config/service';
import InvalidArgumentsError from './common/errors/invalid-arguments';
import type { Dictionary } from './common/utils/dictionary';
import { parseArgs } from './params/args';
import { parseJSONParams } from './params/json';
import { isMomentFormat, parseMoment } from './params/moment';
import type ParameterSet from './params/parameter-set';

interface FlagDefinition {
  type: 'boolean' | 'option';
  char?: string;
}

export interface SplitArgv {
  flag_argv: string[];
  param_argv: string[];
}

export default abstract class BaseCommand extends Command {
  static flags = {
    help: Flags.help({ char: 'h' }),
    stdin: Flags.boolean({
      description: 'Read parameters from stdin (JSON or Moment.from format)',
      default: false,
    }),
  };

  async init(): Promise<void> {
    // Credentials may live in a .env file; variables already set win
    dotenv.config();
    await super.init();
  }

  /**
   * Separate the command's own flags from the trailing `--key value` parameters.
   * The token after a parameter key is always its value, even if it looks like a flag.
   */
  splitArgv(argv: string[] = this.argv): SplitArgv {
    const flags_map: Dictionary<FlagDefinition | undefined> = {};
    for (const [flag_name, flag_definition] of Object.entries(this.ctor.flags || {})) {
      flags_map[`--${flag_name}`] = flag_definition;
      if (flag_definition.char) {
        flags_map[`-${flag_definition.char}`] = flag_definition;
      }
    }

    const flag_argv: string[] = [];
    const param_argv: string[] = [];
    for (let index = 0; index < argv.length; index++) {
      const arg = argv[index];
      // Handle `--webhook value`, `--webhook=value` and `-wvalue`
      let flag_name = arg.split('=', 1)[0];
      if (!flags_map[flag_name] && /^-[^-]./.test(arg)) {
        flag_name = arg.slice(0, 2);
      }
      const flag_definition = flags_map[flag_name];

      if (flag_definition) {
        flag_argv.push(arg);
        if (flag_definition.type === 'option' && arg === flag_name && index + 1 < argv.length) {
          index += 1;
          flag_argv.push(argv[index]);
        }
      } else {
        param_argv.push(arg);
        if (arg.startsWith('--') && arg.length > 2 && index + 1 < argv.length) {
          index += 1;
          param_argv.push(argv[index]);
        }
      }
    }

    return { flag_argv, param_argv };
  }

  async readStdin(): Promise<string> {
    try {
      const chunks: Buffer[] = [];
      for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks).toString('utf8').trim();
    } catch (err) {
      throw new InvalidArgumentsError(`failed to read stdin: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  /**
   * Collect parameters from stdin (when requested) and the trailing arguments. Arguments
   * override stdin values key by key.
   */
  async getParams(param_argv: string[], use_stdin: boolean, support_moment: boolean): Promise<ParameterSet> {
    let params: ParameterSet | undefined;

    if (use_stdin) {
      const input = await this.readStdin();
      if (support_moment && isMomentFormat(input)) {
        this.debug('detected Moment.from on stdin');
        params = parseMoment(input);
      } else {
        this.debug('parsing stdin as JSON');
        params = parseJSONParams(input);
      }
    }

    if (param_argv.length > 0) {
      const cli_params = parseArgs(param_argv);
      params = params ? params.merge(cli_params) : cli_params;
    }

    if (!params) {
      throw new InvalidArgumentsError('no parameters provided');
    }
    this.debug(`collected ${params.size} params`);
    return params;
  }

  printParams(title: string, params: ParameterSet): void {
    console.error(`\n${title}\n${JSON.stringify(params.redact(), null, 2)}`);
  }

  createApp(): AppService {
    const config = AppConfig.fromEnv(process.env);
    this.debug('api config: %O', config.toJSON());
    return AppService.create(config, this.config.version);
  }

  async catch(error: Error & { exitCode?: number; oclif?: { exit?: number } }): Promise<void> {
    if (error instanceof Errors.ExitError) {
      if (error.oclif.exit === 0) return;
      throw error;
    }
    if (error.oclif?.exit === 0) return;

    if (error.stack) {
      this.debug(error.stack);
    }
    console.error(chalk.red(`error: ${error.message}`));
    this.exit(1);
  }
}
