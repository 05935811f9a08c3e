import { app } from './app';
import { initializeServer } from './lib/server-init';

const PORT = Number(process.env.PORT) || 4321;

initializeServer();

app.listen(PORT, () => {
  console.log(`[Server] Listening on http://localhost:${PORT}`);
});
