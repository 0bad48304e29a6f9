import { expect } from '@oclif/test';
import Debug from '../../src/commands/debug';
import { MockAntithesisApi, ROOT } from '../utils/mocks';

describe('debug', () => {
  // set to true while working on tests for easier debugging; otherwise oclif/test eats the stdout/stderr
  const print = false;

  const debugging_params = {
    'antithesis.debugging.session_id': 'f89d5c11f5e3bf5e4bb3641809800cee-44-22',
    'antithesis.debugging.input_hash': '6057726200491963783',
    'antithesis.debugging.vtime': '329.8037810830865',
  };

  const debugging_args = Object.entries(debugging_params).flatMap(([key, value]) => [`--${key}`, value]);

  new MockAntithesisApi({ print })
    .launch('debugging', { body: { params: debugging_params }, response: 'session requested' })
    .getTests()
    .do(() => Debug.run(debugging_args, ROOT))
    .it('launches a debugging session from arguments', ctx => {
      expect(ctx.stdout).to.equal('session requested\n');
      expect(ctx.stderr).to.contain('\nRequesting the Antithesis multiverse debugger with params:\n');
      expect(ctx.stderr).to.contain('"antithesis.debugging.vtime": "329.8037810830865"');
      expect(ctx.stderr).to.match(/\nExpect a debugging session email from Antithesis around .+\n$/);
    });

  new MockAntithesisApi({ print })
    .stdin('Moment.from({ session_id: "f89d5c11f5e3bf5e4bb3641809800cee-44-22", input_hash: "6057726200491963783", vtime: 329.8037810830865 })')
    .launch('debugging', { body: { params: debugging_params } })
    .getTests()
    .do(() => Debug.run(['--stdin'], ROOT))
    .it('reads a Moment.from literal from stdin');

  new MockAntithesisApi({ print })
    .stdin(JSON.stringify(debugging_params))
    .launch('debugging', {
      body: { params: { ...debugging_params, 'antithesis.report.recipients': 'team@example.com' } },
    })
    .getTests()
    .do(() => Debug.run(['--stdin', '--antithesis.report.recipients', 'team@example.com'], ROOT))
    .it('reads JSON from stdin and merges arguments', ctx => {
      expect(ctx.stderr).to.contain('"antithesis.report.recipients": "[REDACTED]"');
    });

  new MockAntithesisApi({ print })
    .stdin('Moment.from({ session_id: "abc", input_hash: "1", vtime: 1 })')
    .launch('debugging', {
      body: {
        params: {
          'antithesis.debugging.session_id': 'abc',
          'antithesis.debugging.input_hash': '1',
          'antithesis.debugging.vtime': '2.5',
        },
      },
    })
    .getTests()
    .do(() => Debug.run(['--stdin', '--antithesis.debugging.vtime', '2.5'], ROOT))
    .it('lets arguments override a Moment.from literal');

  new MockAntithesisApi({ print })
    .getTests()
    .do(() => Debug.run([...debugging_args, '--antithesis.duration', '30'], ROOT))
    .catch(err => expect(err.message).to.equal('EEXIT: 1'))
    .it('rejects parameters outside the debugging profile', ctx => {
      expect(ctx.stderr).to.contain(`additional property 'antithesis.duration' not allowed`);
    });

  new MockAntithesisApi({ print })
    .stdin('Moment.from({ session_id: "abc", input_hash: "1", vtime: 1, extra: 2 })')
    .getTests()
    .do(() => Debug.run(['--stdin'], ROOT))
    .catch(err => expect(err.message).to.equal('EEXIT: 1'))
    .it('rejects unknown Moment.from keys', ctx => {
      expect(ctx.stderr).to.contain('error: invalid arguments: unrecognized Moment.from key: extra');
    });

  new MockAntithesisApi({ print })
    .stdin('{"antithesis.debugging.session_id": "abc", "antithesis.debugging.input_hash": 6057726200491963783, "antithesis.debugging.vtime": 1}')
    .getTests()
    .do(() => Debug.run(['--stdin'], ROOT))
    .catch(err => expect(err.message).to.equal('EEXIT: 1'))
    .it('rejects an unquoted hash that JSON cannot hold exactly', ctx => {
      expect(ctx.stderr).to.contain('error: invalid arguments: antithesis.debugging.input_hash is too large to represent exactly; quote it as a string');
    });

  new MockAntithesisApi({ print })
    .getTests()
    .do(() => Debug.run([], ROOT))
    .catch(err => expect(err.message).to.equal('EEXIT: 1'))
    .it('requires parameters', ctx => {
      expect(ctx.stderr).to.contain('error: invalid arguments: no parameters provided');
    });
});
