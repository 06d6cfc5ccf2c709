export const DEFAULT_ZOOM = 4;
export const DEFAULT_PAGE_SEPARATOR = '';
