import { Request, Response } from 'express';
import { httpStatusCode } from '../lib/constant';
import { formatErrorResponse } from '../lib/errors';
import { CatalogQuery, catalogService } from '../services/catalog.service';
import { notice } from '../types/notice';
import { AuthRequest } from '../types/request';

const queryString = (value: unknown) => (typeof value === 'string' ? value : undefined);

// Catálogo con filtros: ?category=&search=&minPrice=&maxPrice=
export const getProducts = async (req: Request, res: Response) => {
  try {
    const query: CatalogQuery = {
      category: queryString(req.query.category),
      search: queryString(req.query.search),
      minPrice: queryString(req.query.minPrice),
      maxPrice: queryString(req.query.maxPrice),
    };

    const page = await catalogService.listProducts(query);
    res.status(httpStatusCode.OK).json({ success: true, ...page });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};

export const getProduct = async (req: Request, res: Response) => {
  try {
    const product = await catalogService.getProduct(req.params.id);
    res.status(httpStatusCode.OK).json({ success: true, product });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};

export const getCategories = async (_req: Request, res: Response) => {
  try {
    const categories = await catalogService.listCategories();
    res.status(httpStatusCode.OK).json({ success: true, categories });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};

// Solo administradores
export const createProduct = async (req: AuthRequest, res: Response) => {
  try {
    const product = await catalogService.createProduct(req.body ?? {});
    res.status(httpStatusCode.CREATED).json({
      success: true,
      product,
      notices: [notice('success', `Producto '${product.name}' añadido correctamente`)],
    });
  } catch (error) {
    formatErrorResponse(res, error);
  }
};
