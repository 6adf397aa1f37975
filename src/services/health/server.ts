import http from 'http';

export function startHealthServer(port: number): http.Server {
  const server = http.createServer((_req, res) => {
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(
      JSON.stringify({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: 'chat-expense-tracker',
      })
    );
  });

  server.listen(port, () => {
    console.log(`Health check server running on port ${port}`);
  });

  return server;
}
