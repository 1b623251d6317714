import dotenv from 'dotenv';
dotenv.config();
import { createApp } from './app';
import { ConfigError, loadConfig, type AppConfig } from './config';
import { createPool } from './db/pool';
import { runMigrations } from './db/migrate';
import { createPgStore } from './store/pg';
import { createServices } from './services';
import { createEmailTransport } from './services/email';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`❌ ${err.message}`);
      console.error('   Copy .env.example to .env and fill in your values.');
      process.exit(1);
    }
    throw err;
  }
}

// ─── Async startup ────────────────────────────────────────────────────────

async function main() {
  const config = loadConfigOrExit();

  // 1. Initialise PostgreSQL pool
  const pool = createPool(config.databaseUrl);
  console.log('[startup] PostgreSQL pool initialised');

  // 2. Run numbered SQL migrations
  const applied = await runMigrations(pool);
  console.log(`[startup] Migrations applied: ${applied}`);

  // 3. Wire services
  const email = createEmailTransport(config.email);
  if (!email.enabled) {
    console.warn('[startup] SMTP not configured, email notifications disabled');
  }
  const services = createServices(createPgStore(pool), {
    email,
    dashboardUrl: config.dashboardUrl,
  });

  // 4. Create Express app
  const app = createApp(services, {
    jwtSecret: config.jwtSecret,
    corsOrigins: config.corsOrigins,
    migrations: applied,
  });

  // ─── Start server ──────────────────────────────────────────────────────

  const { port } = config;
  app.listen(port, () => {
    console.log(`\n🚀 Pressdesk backend running on http://localhost:${port}`);
    console.log(`   Health:        GET  http://localhost:${port}/health`);
    console.log(`   Submissions:   GET  http://localhost:${port}/api/submissions`);
    console.log(`   Review:        POST http://localhost:${port}/api/submissions/:id/review`);
    console.log(`   Library:       GET  http://localhost:${port}/api/library`);
    console.log(`   Notifications: GET  http://localhost:${port}/api/notifications`);
    console.log(`   Activity log:  GET  http://localhost:${port}/api/audit\n`);
  });

  return app;
}

main().catch((err) => {
  console.error('❌ Fatal startup error:', err);
  process.exit(1);
});

export default main;
