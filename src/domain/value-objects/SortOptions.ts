export enum SortField {
  TITLE = "title",
  CONTENT = "content",
}

export enum SortDirection {
  ASC = "asc",
  DESC = "desc",
}

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;

export interface ListOptions {
  sort?: SortField;
  direction: SortDirection;
  page: number;
  limit: number;
}
