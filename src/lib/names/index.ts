export { foldName, nameTokens, normalizeNameParts, displayNameOf } from './normalize';
export { editDistance, isTokenSubset, sharesToken } from './similarity';
