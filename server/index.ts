import { API_PORT, DATA_DIR, NODE_ENV, REPORT_PATH } from './config.js';
import { createApp } from './app.js';

const app = createApp();

// =============================================================================
// Start server
// =============================================================================
app.listen(API_PORT, () => {
  console.log(`🛫 Departure Stats API (${NODE_ENV}) running on http://localhost:${API_PORT}`);
  console.log(`   Data directory: ${DATA_DIR}`);
  console.log(`   Results report: ${REPORT_PATH}`);
  console.log('   Endpoints:');
  console.log('     GET  /api/health');
  console.log('     GET  /api/directory');
  console.log('     POST /api/analysis');
  console.log('     GET  /api/histogram');
});
