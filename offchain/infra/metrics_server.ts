import http from 'http';
import { registry } from './metrics';
import { log } from './logger';

const srv = http.createServer(async (req, res) => {
  if (req.url === '/metrics') {
    try {
      const data = await registry.metrics();
      res.writeHead(200, { 'Content-Type': registry.contentType });
      return res.end(data);
    } catch (e) {
      res.writeHead(500);
      return res.end(e instanceof Error ? e.message : String(e));
    }
  }
  if (req.url === '/live' || req.url === '/ready') {
    res.writeHead(200);
    return res.end('ok');
  }
  res.writeHead(404);
  res.end();
});

const port = Number(process.env.PROM_PORT || '9464');

srv.listen(Number.isFinite(port) ? port : 9464, () => {
  log.info({ port }, 'metrics-server-ready');
});
