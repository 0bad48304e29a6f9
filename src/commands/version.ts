import { Command } from '@oclif/core';

export default class Version extends Command {
  static description = 'Print version information';

  async run(): Promise<void> {
    this.log(`${this.config.bin} ${this.config.version}`);
  }
}
