export { AliasRegistry, globalAliases } from './AliasRegistry';
