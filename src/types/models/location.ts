export interface LocationRef {
  id: string;
  name: string;
}
