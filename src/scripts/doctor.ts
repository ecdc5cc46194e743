/* eslint-disable no-console */
import { runConfigDoctor } from '../core/config/doctor';

runConfigDoctor({ ping: process.argv.includes('--ping') })
  .then((ok) => {
    process.exitCode = ok ? 0 : 1;
  })
  .catch((error) => {
    console.error('Doctor failed:', error);
    process.exitCode = 1;
  });
