import { Flags } from '@oclif/core';
import LaunchUtils from '../antithesis/launch/launch.utils';
import BaseCommand from '../base-command';
import localizedTimestamp from '../common/utils/localized-timestamp';
import { validateOrRejectParams } from '../params/schema/validator';

export default class Run extends BaseCommand {
  static description = 'Launch a test run';

  static usage = 'run -w <webhook> [--stdin] [--<key> <value>]...';

  static examples = [
    `snouty run -w basic_test \\
    --antithesis.description "nightly test run" \\
    --antithesis.config_image config:latest \\
    --antithesis.images app:latest \\
    --antithesis.duration 30 \\
    --antithesis.report.recipients "team@example.com"`,
    `echo '{"antithesis.duration": "30"}' | snouty run -w basic_test --stdin`,
  ];

  static flags = {
    ...BaseCommand.flags,
    webhook: Flags.string({
      char: 'w',
      description: 'Webhook endpoint name (e.g., basic_test, basic_k8s_test)',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { flag_argv, param_argv } = this.splitArgv();
    const { flags } = await this.parse(Run, flag_argv);
    this.debug(`running test with webhook: ${flags.webhook}`);

    const params = await this.getParams(param_argv, flags.stdin, false);
    validateOrRejectParams(params, 'testParams');
    this.debug('validation passed');

    this.printParams('Requesting Antithesis test run with params:', params);

    const app = this.createApp();
    const { status, body } = await LaunchUtils.launchTestRun(app, flags.webhook, params);
    this.debug(`response status: ${status}`);
    this.log(body);

    const eta = LaunchUtils.estimateEmailTime(params);
    console.error(`\nExpect a report email from Antithesis around ${localizedTimestamp(eta)}`);
  }
}
