#!/usr/bin/env node
import meow from 'meow';

import { enableDebug } from '../util';
import { runCommand } from './commands';

const cli = meow(
    `
    Atari DOS diskette access

    Usage
      $ atr path-to-diskette [command] [args]

    Commands (with no command, ls is assumed)
      ls [-la1]                    Directory listing
                                     -l for long
                                     -a to show system files
                                     -1 to show a single name per line
      cat [-e] atari-name          Type file to console
                                     (-e to convert line ending from 0x9b to 0x0a)
      get atari-name [local-name]  Copy file from diskette to local-name
      put local-name [atari-name]  Copy file from local-name to diskette
      free                         Print amount of free space
      rm atari-name                Delete a file
      check                        Check filesystem
      dump sector                  Hex dump of one sector
      create [--enhanced]          Create an empty formatted diskette

    Options
      --verbose, -v                Debug output
      --help, -h                   Show help
      --version                    Show version
`,
    {
        // -1 would otherwise read as a number
        argv: process.argv.slice(2).map((arg) => (arg === '-1' ? '--single' : arg)),
        flags: {
            long: { type: 'boolean', alias: 'l', default: false },
            all: { type: 'boolean', alias: 'a', default: false },
            single: { type: 'boolean', default: false },
            eol: { type: 'boolean', alias: 'e', default: false },
            enhanced: { type: 'boolean', default: false },
            verbose: { type: 'boolean', alias: 'v', default: false },
            help: { type: 'boolean', alias: 'h', default: false },
        },
    }
);

const { input, flags } = cli;

if (flags.help || input.length === 0) {
    cli.showHelp(input.length === 0 ? 1 : 0);
}

enableDebug(flags.verbose);

const [image, ...command] = input;
process.exitCode = runCommand(image, command, flags);
