import { createProgram } from './program.js';
import { executeCommand, processIO } from './session.js';

const program = createProgram({
  loop: async (prompt, options) => {
    process.exitCode = await executeCommand('loop', prompt, options, processIO());
  },
  evolve: async (prompt, options) => {
    process.exitCode = await executeCommand('evolve', prompt, options, processIO());
  },
});

await program.parseAsync(process.argv);
