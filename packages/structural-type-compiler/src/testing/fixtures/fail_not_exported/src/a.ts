/** @structural */
interface Hidden {
  id: string;
}
