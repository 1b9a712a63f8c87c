import { main } from './run';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error('[LEDGER] Unexpected failure:', err);
    process.exitCode = 1;
  },
);
