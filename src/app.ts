import express from 'express';
import mongoose from 'mongoose';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import expressWinston from 'express-winston';
import cluster from 'cluster';
import os from 'os';
import chalk from 'chalk';

import { config } from './config/env';
import { logger } from './config/logger';
import { CART_TOKEN_HEADER, httpStatusCode } from './lib/constant';
import { seedService } from './services/seed.service';
import authRoutes from './routes/auth.routes';
import productRoutes from './routes/product.routes';
import cartRoutes from './routes/cart.routes';
import orderRoutes from './routes/order.routes';
import userRoutes from './routes/user.routes';

// En desarrollo no se usa clustering
const shouldUseCluster = config.nodeEnv !== 'development' && process.env.DISABLE_CLUSTER !== 'true';

if (cluster.isPrimary && shouldUseCluster) {
  const numCPUs = os.cpus().length;
  console.log(chalk.blue.bold(`📊 Iniciando cluster con ${numCPUs} workers...`));

  for (let i = 0; i < numCPUs; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker) => {
    console.log(chalk.red.bold(`⚠️ Worker ${worker.id} ha muerto, creando uno nuevo...`));
    cluster.fork();
  });
} else {
  const app = express();

  if (!shouldUseCluster) {
    console.log(chalk.yellow.bold('🔍 Ejecutando en modo único (sin clustering)'));
  }

  app.set('trust proxy', 1);

  app.use(helmet({
    frameguard: { action: 'deny' },
    hsts: { maxAge: 31536000, includeSubDomains: true },
  }));

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', CART_TOKEN_HEADER],
    exposedHeaders: [CART_TOKEN_HEADER],
  }));

  app.use(rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 1000,
    message: 'Demasiadas solicitudes desde esta IP',
  }));

  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  app.use(expressWinston.logger({
    winstonInstance: logger,
    meta: true,
    msg: 'HTTP {{req.method}} {{req.url}}',
    expressFormat: false,
    colorize: true,
  }));

  // Rutas
  app.use('/api/cart', cartRoutes);
  app.use('/api', [authRoutes, productRoutes, orderRoutes, userRoutes]);

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      connections: mongoose.connections.length,
      worker: cluster.isWorker ? cluster.worker?.id : 'primary',
    });
  });

  // Manejo de errores
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error(`Error: ${err.message}\n${err.stack}`);
    res.status(httpStatusCode.INTERNAL_SERVER_ERROR).json({
      success: false,
      message: config.nodeEnv === 'production' ? 'Error interno del servidor' : err.message,
    });
  });

  // Solo el primer worker (o el proceso único) muestra los logs de arranque y siembra datos
  const isFirstWorker = !cluster.isWorker || cluster.worker?.id === 1;

  const connectDB = async () => {
    try {
      if (isFirstWorker) {
        console.log(chalk.blue.bold('🔌 Conectando a MongoDB...'));
      }

      await mongoose.connect(config.mongoUri, {
        retryWrites: true,
        w: 'majority',
        maxPoolSize: 100,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
      });

      if (isFirstWorker) {
        console.log(chalk.green.bold('✅ Conectado con éxito a MongoDB'));
      }
    } catch (error) {
      console.error(chalk.red.bold('❌ Error de conexión a MongoDB:'), error);
      process.exit(1);
    }
  };

  const startServer = async () => {
    await connectDB();

    if (isFirstWorker && config.seedOnStartup) {
      const seeded = await seedService.seed();
      logger.info(`Datos iniciales: ${seeded.products} productos, ${seeded.accounts} cuentas nuevas`);
    }

    const server = app.listen(config.port, () => {
      if (isFirstWorker) {
        console.log(chalk.green.bold(`🎯 Servidor ejecutándose en puerto ${config.port}`));
      }
    });

    process.on('SIGTERM', () => {
      if (isFirstWorker) {
        console.log(chalk.yellow.bold('🛑 Apagando servidor...'));
      }
      mongoose.disconnect()
        .then(() => server.close(() => process.exit(0)))
        .catch((error: unknown) => {
          logger.error(`Error al cerrar MongoDB: ${String(error)}`);
          process.exit(1);
        });
    });
  };

  startServer().catch((error: unknown) => {
    logger.error(`Error al iniciar el servidor: ${error instanceof Error ? error.stack : String(error)}`);
    process.exit(1);
  });
}
