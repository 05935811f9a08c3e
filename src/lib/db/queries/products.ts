import { asc, eq } from 'drizzle-orm';
import { db, products, productCategories, productVariations } from '../index';
import type { NewProduct } from '../schema';
import { uniqueSlug } from '../../slug';

export async function getProducts() {
  return db.query.products.findMany({
    orderBy: [asc(products.id)],
    with: {
      productCategories: {
        with: {
          category: true
        }
      },
      variations: {
        orderBy: [asc(productVariations.id)]
      }
    }
  });
}

export async function getProductById(id: number) {
  return db.query.products.findFirst({
    where: eq(products.id, id),
    with: {
      productCategories: {
        with: {
          category: true
        }
      },
      variations: {
        orderBy: [asc(productVariations.id)]
      }
    }
  });
}

export async function createProduct(
  data: Omit<NewProduct, 'slug'> & { slug?: string },
  categoryIds: number[] = []
) {
  const slug =
    data.slug ||
    (await uniqueSlug(data.name, async (candidate) => {
      const existing = await db.query.products.findFirst({
        where: eq(products.slug, candidate)
      });
      return existing !== undefined;
    }, 'product'));

  return db.transaction((tx) => {
    const product = tx.insert(products).values({ ...data, slug }).returning().get();

    for (const categoryId of new Set(categoryIds)) {
      tx.insert(productCategories).values({ productId: product.id, categoryId }).run();
    }

    return product;
  });
}
