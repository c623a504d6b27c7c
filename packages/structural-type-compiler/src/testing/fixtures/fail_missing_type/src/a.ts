/** @structural */
export interface Book {
  title;
}
