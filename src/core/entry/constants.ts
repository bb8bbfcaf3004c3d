/** Document extensions: recipes and menus. */
export const RECIPE_EXTENSION = 'cook';
export const MENU_EXTENSION = 'menu';
export const DOCUMENT_EXTENSIONS = [RECIPE_EXTENSION, MENU_EXTENSION] as const;

/** Image extensions in priority order. */
export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp'] as const;
