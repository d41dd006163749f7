import { logger } from '../config/logger';
import { ALL_CATEGORIES } from '../lib/constant';
import { ConflictError, FormData, NotFoundError, ValidationError } from '../lib/errors';
import { Notice, notice } from '../types/notice';
import { NewProduct, ProductFilter, ProductRecord, Stores } from '../types/store';
import { mongoStores } from '../stores/mongo.store';

export interface CatalogQuery {
  category?: string;
  search?: string;
  minPrice?: string;
  maxPrice?: string;
}

export interface CatalogPage {
  products: ProductRecord[];
  categories: string[];
  selectedCategory: string | null;
  search: string | null;
  minPrice: string | null;
  maxPrice: string | null;
  notices: Notice[];
}

export interface ProductForm {
  name?: unknown;
  description?: unknown;
  price?: unknown;
  stock?: unknown;
  imageUrl?: unknown;
  category?: unknown;
}

type ParsedPrice = { kind: 'absent' } | { kind: 'invalid' } | { kind: 'value'; value: number };

const parsePrice = (raw: string | undefined): ParsedPrice => {
  if (raw === undefined || raw.trim() === '') return { kind: 'absent' };
  const value = Number(raw.trim());
  return Number.isFinite(value) ? { kind: 'value', value } : { kind: 'invalid' };
};

const text = (value: unknown) => (typeof value === 'string' ? value.trim() : '');

/**
 * Construye el filtro del catálogo a partir de los parámetros de la URL.
 * Los errores de precio se devuelven como avisos y anulan el filtro de precio.
 */
export const buildCatalogFilter = (query: CatalogQuery): { filter: ProductFilter; notices: Notice[] } => {
  const filter: ProductFilter = {};
  const notices: Notice[] = [];

  if (query.category && query.category !== ALL_CATEGORIES) {
    filter.category = query.category;
  }

  if (query.search) {
    filter.search = query.search;
  }

  const min = parsePrice(query.minPrice);
  const max = parsePrice(query.maxPrice);

  if (min.kind === 'invalid' || max.kind === 'invalid') {
    notices.push(notice('error', 'Precios inválidos. Introduce solo números.'));
    return { filter, notices };
  }

  const price: { gte?: number; lte?: number } = {};

  if (min.kind === 'value') {
    if (min.value >= 0) price.gte = min.value;
    else notices.push(notice('error', 'El precio mínimo no puede ser negativo.'));
  }

  if (max.kind === 'value') {
    if (max.value >= 0) price.lte = max.value;
    else notices.push(notice('error', 'El precio máximo no puede ser negativo.'));
  }

  if (price.gte !== undefined && price.lte !== undefined && price.gte > price.lte) {
    notices.push(notice('error', 'El precio mínimo no puede ser mayor que el máximo.'));
    return { filter, notices };
  }

  if (price.gte !== undefined || price.lte !== undefined) {
    filter.price = price;
  }

  return { filter, notices };
};

const parseProductForm = (form: ProductForm): NewProduct => {
  const formData: FormData = { ...form };
  const rawPrice = text(form.price);
  const rawStock = text(form.stock);
  const price = rawPrice === '' ? Number.NaN : Number(rawPrice);
  const stock = /^[+-]?\d+$/.test(rawStock) ? Number.parseInt(rawStock, 10) : Number.NaN;

  if (!Number.isFinite(price) || Number.isNaN(stock)) {
    throw new ValidationError('El precio y el stock deben ser números válidos', formData);
  }
  if (price <= 0 || stock < 0) {
    throw new ValidationError('El precio debe ser positivo y el stock no negativo', formData);
  }

  const product = {
    name: text(form.name),
    description: text(form.description),
    price,
    stock,
    imageUrl: text(form.imageUrl),
    category: text(form.category),
  };

  if (!product.name || !product.description || !product.imageUrl || !product.category) {
    throw new ValidationError('Todos los campos son obligatorios', formData);
  }

  return product;
};

export const createCatalogService = (stores: Stores) => {
  // Categorías distintas ordenadas, con 'All' delante
  const listCategories = async (): Promise<string[]> => {
    const categories = await stores.products.distinctCategories();
    return [ALL_CATEGORIES, ...[...categories].sort()];
  };

  return {
    listCategories,

    async listProducts(query: CatalogQuery): Promise<CatalogPage> {
      const { filter, notices } = buildCatalogFilter(query);
      const [products, categories] = await Promise.all([
        stores.products.find(filter),
        listCategories(),
      ]);

      return {
        products,
        categories,
        selectedCategory: query.category ?? null,
        search: query.search ?? null,
        minPrice: query.minPrice ?? null,
        maxPrice: query.maxPrice ?? null,
        notices,
      };
    },

    async getProduct(productId: string): Promise<ProductRecord> {
      const product = await stores.products.findById(productId);
      if (!product) {
        throw new NotFoundError('Producto no encontrado');
      }
      return product;
    },

    async createProduct(form: ProductForm): Promise<ProductRecord> {
      const data = parseProductForm(form);

      const existing = await stores.products.findByName(data.name);
      if (existing) {
        throw new ConflictError(
          `Ya existe un producto llamado '${data.name}'. Usa un nombre distinto.`,
          { ...form }
        );
      }

      const product = await stores.products.create(data);
      logger.info(`Producto '${product.name}' creado con ID: ${product.id}`);
      return product;
    },
  };
};

export type CatalogService = ReturnType<typeof createCatalogService>;

export const catalogService = createCatalogService(mongoStores);
