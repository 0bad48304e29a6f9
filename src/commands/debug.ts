import LaunchUtils from '../antithesis/launch/launch.utils';
import BaseCommand from '../base-command';
import localizedTimestamp from '../common/utils/localized-timestamp';
import { validateOrRejectParams } from '../params/schema/validator';

export default class Debug extends BaseCommand {
  static description = 'Launch a debugging session';

  static usage = 'debug [--stdin] [--<key> <value>]...';

  static examples = [
    `snouty debug \\
    --antithesis.debugging.session_id f89d5c11f5e3bf5e4bb3641809800cee-44-22 \\
    --antithesis.debugging.input_hash 6057726200491963783 \\
    --antithesis.debugging.vtime 329.8037810830865`,
    `echo 'Moment.from({ session_id: "...", input_hash: "...", vtime: ... })' | snouty debug --stdin`,
  ];

  static flags = {
    ...BaseCommand.flags,
  };

  async run(): Promise<void> {
    const { flag_argv, param_argv } = this.splitArgv();
    const { flags } = await this.parse(Debug, flag_argv);
    this.debug('starting debug session');

    const params = await this.getParams(param_argv, flags.stdin, true);
    validateOrRejectParams(params, 'debuggingParams');
    this.debug('validation passed');

    this.printParams('Requesting the Antithesis multiverse debugger with params:', params);

    const app = this.createApp();
    const { status, body } = await LaunchUtils.launchDebuggingSession(app, params);
    this.debug(`response status: ${status}, body length: ${body.length}`);
    this.log(body);

    const eta = LaunchUtils.estimateEmailTime();
    console.error(`\nExpect a debugging session email from Antithesis around ${localizedTimestamp(eta)}`);
  }
}
