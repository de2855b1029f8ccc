/**
 * Two-rule build used by the CLI tests: `shout` upper-cases the file
 * `message` writes.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { defineBuild, file } from '@kiln/kernel';

export default defineBuild((store) => {
  store.add({
    name: 'message',
    outputs: ['out/message.txt'],
    action: (path: string, text: string) => writeFileSync(path, text),
    args: [file('out/message.txt'), 'hello'],
  });
  store.add({
    name: 'shout',
    outputs: ['out/shout.txt'],
    action: (src: string, dst: string) => writeFileSync(dst, readFileSync(src, 'utf-8').toUpperCase()),
    args: [file('out/message.txt'), file('out/shout.txt')],
  });
});
