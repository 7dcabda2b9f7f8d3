export { suggestHierarchiesPrompt } from './suggestHierarchies';
