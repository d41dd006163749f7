import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { createMemoryStores, MemoryStores } from '../test/memoryStore';
import { buildCatalogFilter, CatalogService, createCatalogService } from './catalog.service';

describe('buildCatalogFilter', () => {
  it('builds an empty filter when no parameters are given', () => {
    expect(buildCatalogFilter({})).toEqual({ filter: {}, notices: [] });
  });

  it('ignores the "All" category', () => {
    expect(buildCatalogFilter({ category: 'All' }).filter).toEqual({});
    expect(buildCatalogFilter({ category: 'Audio' }).filter).toEqual({ category: 'Audio' });
  });

  it('applies both price bounds', () => {
    expect(buildCatalogFilter({ minPrice: '10', maxPrice: ' 50.5 ' }).filter).toEqual({
      price: { gte: 10, lte: 50.5 },
    });
  });

  it('drops the price filter when a bound is not a number', () => {
    const result = buildCatalogFilter({ category: 'Audio', minPrice: 'diez', maxPrice: '50' });

    expect(result.filter).toEqual({ category: 'Audio' });
    expect(result.notices).toEqual([{ level: 'error', message: 'Precios inválidos. Introduce solo números.' }]);
  });

  it('ignores only the negative bound', () => {
    const result = buildCatalogFilter({ minPrice: '-5', maxPrice: '20' });

    expect(result.filter).toEqual({ price: { lte: 20 } });
    expect(result.notices).toEqual([{ level: 'error', message: 'El precio mínimo no puede ser negativo.' }]);
  });

  it('drops the price filter when the minimum exceeds the maximum', () => {
    const result = buildCatalogFilter({ minPrice: '80', maxPrice: '20' });

    expect(result.filter).toEqual({});
    expect(result.notices).toEqual([
      { level: 'error', message: 'El precio mínimo no puede ser mayor que el máximo.' },
    ]);
  });
});

describe('catalogService', () => {
  let stores: MemoryStores;
  let catalog: CatalogService;

  beforeEach(() => {
    stores = createMemoryStores();
    catalog = createCatalogService(stores);
    stores.addProduct({ name: 'Ratón óptico', description: 'Ratón con cable', price: 15, category: 'Informática' });
    stores.addProduct({ name: 'Teclado', description: 'Teclado mecánico RGB', price: 70, category: 'Informática' });
    stores.addProduct({ name: 'Auriculares', description: 'Sonido envolvente', price: 40, category: 'Audio' });
  });

  describe('listProducts', () => {
    it('lists every product with the sorted categories after "All"', async () => {
      const page = await catalog.listProducts({});

      expect(page.products).toHaveLength(3);
      expect(page.categories).toEqual(['All', 'Audio', 'Informática']);
      expect(page.selectedCategory).toBeNull();
      expect(page.notices).toEqual([]);
    });

    it('combines category, search and price filters', async () => {
      const page = await catalog.listProducts({ category: 'Informática', search: 'TECLADO', minPrice: '20' });

      expect(page.products.map((product) => product.name)).toEqual(['Teclado']);
      expect(page.selectedCategory).toBe('Informática');
      expect(page.search).toBe('TECLADO');
      expect(page.minPrice).toBe('20');
      expect(page.maxPrice).toBeNull();
    });

    it('searches descriptions as well as names', async () => {
      const page = await catalog.listProducts({ search: 'envolvente' });

      expect(page.products.map((product) => product.name)).toEqual(['Auriculares']);
    });

    it('still lists products when the price parameters are invalid', async () => {
      const page = await catalog.listProducts({ maxPrice: 'mucho' });

      expect(page.products).toHaveLength(3);
      expect(page.notices).toHaveLength(1);
    });
  });

  describe('listCategories', () => {
    it('reads the categories without loading the products', async () => {
      const find = vi.spyOn(stores.products, 'find');

      await expect(catalog.listCategories()).resolves.toEqual(['All', 'Audio', 'Informática']);
      expect(find).not.toHaveBeenCalled();
    });
  });

  describe('getProduct', () => {
    it('returns the product by id', async () => {
      const created = stores.addProduct({ name: 'Monitor' });

      await expect(catalog.getProduct(created.id)).resolves.toEqual(created);
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(catalog.getProduct('desconocido')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('createProduct', () => {
    const form = {
      name: 'Webcam',
      description: 'Webcam Full HD',
      price: '35.5',
      stock: '12',
      imageUrl: '/images/webcam.jpg',
      category: 'Informática',
    };

    it('creates the product with parsed numbers', async () => {
      const product = await catalog.createProduct(form);

      expect(product).toMatchObject({ name: 'Webcam', price: 35.5, stock: 12 });
      expect(stores.data.products.get(product.id)?.category).toBe('Informática');
    });

    it('rejects prices and stock that are not numbers', async () => {
      await expect(catalog.createProduct({ ...form, stock: '1.5' })).rejects.toThrow(
        'El precio y el stock deben ser números válidos'
      );
    });

    it('rejects a zero price or negative stock', async () => {
      await expect(catalog.createProduct({ ...form, price: '0' })).rejects.toThrow(
        'El precio debe ser positivo y el stock no negativo'
      );
      await expect(catalog.createProduct({ ...form, stock: '-1' })).rejects.toThrow(
        'El precio debe ser positivo y el stock no negativo'
      );
    });

    it('requires every text field and returns the submitted form', async () => {
      const error = await catalog.createProduct({ ...form, description: '  ' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: 'Todos los campos son obligatorios', formData: { ...form, description: '  ' } });
    });

    it('rejects a duplicate name', async () => {
      await catalog.createProduct(form);

      const error = await catalog.createProduct(form).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ message: "Ya existe un producto llamado 'Webcam'. Usa un nombre distinto." });
      expect(stores.data.products.size).toBe(4);
    });
  });
});
