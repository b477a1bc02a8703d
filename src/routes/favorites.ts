import express, { type Request, type Response } from 'express';

import { FavoriteValidationError } from '../services/errors';
import type { FavoritesStore } from '../services/favoritesStore';
import { respondWithError } from './errors';

interface FavoriteBody {
  label?: unknown;
  path?: unknown;
}

export function createFavoritesRouter(favorites: FavoritesStore): express.Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ favorites: favorites.list() });
  });

  router.put('/', async (req: Request, res: Response) => {
    const { label, path }: FavoriteBody = req.body ?? {};

    try {
      if (typeof label !== 'string' || typeof path !== 'string') {
        throw new FavoriteValidationError('label and path are required.');
      }

      const favorite = await favorites.add(label, path);
      return res.json({ favorite });
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  router.delete('/:label', async (req: Request, res: Response) => {
    try {
      const removed = await favorites.remove(req.params.label);
      if (!removed) {
        return res.status(404).json({ message: 'Favorite not found.' });
      }
      return res.status(204).end();
    } catch (error) {
      return respondWithError(res, error);
    }
  });

  return router;
}
