/** Primary key: items sharing a name are told apart by their id. */
export interface ItemKey {
  readonly name: string;
  readonly id: string;
}

export interface Item extends ItemKey {
  createdAt: string;
}
