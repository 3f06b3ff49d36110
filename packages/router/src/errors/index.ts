export * from './router.error';
export * from './pattern-syntax.error';
export * from './duplicate-route.error';
