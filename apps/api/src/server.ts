import { serve } from '@hono/node-server';
import { createApp } from './index';
import { getConfig } from './services/config';
import { log } from './services/logging';

const port = Number(process.env.PORT) || getConfig().server.port;

log({ level: 'info', component: 'Server', message: `Starting server on port ${port}...` });

serve({ fetch: createApp().fetch, port }, (info) => {
  log({ level: 'info', component: 'Server', message: `Server running at http://localhost:${info.port}` });
});
