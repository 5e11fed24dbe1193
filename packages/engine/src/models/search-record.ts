export interface SearchRecord {
  readonly title: string;
  readonly url: string;
  readonly summary: string;
}
