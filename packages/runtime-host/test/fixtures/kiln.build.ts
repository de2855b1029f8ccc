/**
 * Build file used by the host tests: one module action writing one output.
 */

import { defineBuild, file, moduleAction } from '@kiln/kernel';

export default defineBuild((store) => {
  store.add({
    name: 'greeting',
    outputs: ['out/greeting.txt'],
    action: moduleAction(new URL('./actions.ts', import.meta.url), 'writeGreeting'),
    args: [file('out/greeting.txt'), 'kiln'],
  });
});
