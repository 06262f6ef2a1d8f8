import { describe, expect, it } from 'vitest';
import { buildProgram } from '../index';

describe('buildProgram', () => {
  it('points to npm test for running the unit tests', () => {
    let help = '';
    const program = buildProgram().configureOutput({
      writeOut: text => {
        help += text;
      },
    });

    program.outputHelp();

    expect(help).toContain('--dry-run');
    expect(help).toContain('To run the unit tests instead of a sync, use `npm test`.');
  });
});
