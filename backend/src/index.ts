import fs from 'fs';
import app from './app';
import { config } from './config';

// Ensure data directories exist
for (const dir of [config.dataDir, config.sessionsDir]) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎬 Cue Editor Backend`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Default format: ${config.defaultFormat}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET    /api/health                 - Check service status`);
  console.info(`   - GET    /api/sessions               - List editing sessions`);
  console.info(`   - POST   /api/sessions               - Open a document`);
  console.info(`   - GET    /api/sessions/:id           - Get document and cues`);
  console.info(`   - POST   /api/sessions/:id/navigate  - Move the cursor`);
  console.info(`   - GET    /api/sessions/:id/cue-at    - Find cue at a time`);
  console.info(`   - POST   /api/sessions/:id/cues      - Insert a cue`);
  console.info(`   - POST   /api/sessions/:id/merge     - Merge with next cue`);
  console.info(`   - PATCH  /api/sessions/:id/times     - Shift or retime a cue`);
  console.info(`   - POST   /api/sessions/:id/sanitize  - Normalise whitespace`);
  console.info(`   - POST   /api/sessions/:id/sort      - Sort cues by start time`);
  console.info(`   - POST   /api/sessions/:id/validate  - Check the grammar`);
  console.info(`\n`);
});

export default app;
