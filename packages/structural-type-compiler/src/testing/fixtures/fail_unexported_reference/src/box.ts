interface Hidden {
  x: number;
}

/** @structural */
export interface Box {
  hidden: Hidden;
}
