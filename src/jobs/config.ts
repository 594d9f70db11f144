export const COLLECT = {
  pageLimit: 50, // provider caps getAuthorFeed at 100
  maxPostsPerActor: 200,
  searchResultsPerTerm: 1, // top match only
  parallel: 2, // be gentle with rate limits for now
  retryTries: 4,
};
