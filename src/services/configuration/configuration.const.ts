export const SECRET_ENCODINGS = ['utf8', 'base64'] as const;
