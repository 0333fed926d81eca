const scale = {
  scraping: {
    navigationTimeout: 15_000, // 15 seconds for a category page
    httpTimeout: 10_000, // 10 seconds for thesaurus requests
    maxRequestRetries: 0, // Failed fetches count as "no images"
  },
  images: {
    extensions: [".jpg", ".png"],
    // An extension this close to the end has no path segment left to cut at
    minTailLength: 5,
  },
} as const;

export default scale;
