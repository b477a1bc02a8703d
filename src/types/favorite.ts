export interface FavoriteDirectory {
  label: string;
  path: string;
}
