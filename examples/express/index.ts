import 'dotenv/config';
import path from 'path';
import { createGatewayApp } from '../../src/app';
import { loadGatewayConfig } from '../../src/lib/config';
import { createLogger } from '../../src/lib/logger';
import { createCatalogService, createOrdersService } from '../../src/services';

// Runs both CRUD services and the gateway in one process, on the ports config/gateway.json points at
async function main() {
  const logger = createLogger({ level: 'debug' });
  const configPath = path.join(__dirname, '../../config/gateway.json');

  const orders = createOrdersService({ logger: logger.child({ service: 'orders' }), exposeDetail: true });
  const catalog = createCatalogService({ logger: logger.child({ service: 'catalog' }), exposeDetail: true });
  await orders.repository.create({ customerName: 'Ada' });
  await catalog.repository.create({ name: 'Kettle', description: 'Stainless steel, 1.7l', price: 24.99 });

  const config = await loadGatewayConfig(configPath);
  if (!config.ok) throw new Error(config.error.join('\n'));
  const built = createGatewayApp({
    config: config.value,
    logger: logger.child({ service: 'gateway' }),
    exposeErrorDetail: true,
    reloadConfig: () => loadGatewayConfig(configPath),
    adminReload: true,
  });
  if (!built.ok) throw new Error(built.error.join('\n'));

  orders.app.listen(5001, () => logger.info('Orders service on :5001'));
  catalog.app.listen(5002, () => logger.info('Catalog service on :5002'));
  built.value.app.listen(5000, () => {
    logger.info('Gateway on :5000');
    logger.info('Try: curl -H "ClientId: demo" http://localhost:5000/api/orders');
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
