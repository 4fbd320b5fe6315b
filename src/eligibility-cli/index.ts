import { runCli } from './run';

runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[CLI] Unexpected failure:', err);
    process.exitCode = 2;
  });
