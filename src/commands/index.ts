export * from './CommandProcessor';
export * from './parseAddArgument';
