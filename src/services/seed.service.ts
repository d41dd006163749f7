import { config } from '../config/env';
import { logger } from '../config/logger';
import { NewProduct, Stores } from '../types/store';
import { mongoStores } from '../stores/mongo.store';
import { hashPassword } from './auth.service';
import initialProducts from '../../data/products.json';

interface DefaultAccount {
  username: string;
  email: string;
  password: string;
  isAdmin: boolean;
}

export const createSeedService = (stores: Stores) => {
  const ensureAccount = async (account: DefaultAccount) => {
    if (await stores.users.findByUsername(account.username)) return false;

    await stores.users.create({
      username: account.username,
      email: account.email,
      passwordHash: await hashPassword(account.password),
      isAdmin: account.isAdmin,
    });
    logger.info(`Usuario por defecto '${account.username}' creado`);
    return true;
  };

  return {
    /**
     * Inserta o actualiza el catálogo inicial por nombre y crea las cuentas
     * por defecto (admin y usuario) si no existen.
     */
    async seed(products: NewProduct[] = initialProducts): Promise<{ products: number; accounts: number }> {
      for (const product of products) {
        await stores.products.upsertByName(product);
      }
      logger.info(`Catálogo inicializado: ${products.length} productos`);

      const created = await Promise.all([
        ensureAccount({ username: 'admin', email: 'admin@example.com', password: config.adminPassword, isAdmin: true }),
        ensureAccount({ username: 'user', email: 'user@example.com', password: config.userPassword, isAdmin: false }),
      ]);

      return { products: products.length, accounts: created.filter(Boolean).length };
    },
  };
};

export const seedService = createSeedService(mongoStores);
