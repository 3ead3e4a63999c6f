import { errorMessage } from '@taskloop/todo-contracts';
import { buildProgram } from './program.js';
import { writeStderr } from './terminal.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    writeStderr(errorMessage(error));
    process.exit(1);
  });
