import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import { startServer } from './api/server.js';

console.log(`
╔════════════════════════════════════════════════════════════════╗
║     USAspending Award Tracker                                  ║
║     Active federal contracts, IDVs and grants by keyword       ║
╚════════════════════════════════════════════════════════════════╝
`);

startServer().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
