import type { SyntheticEvent } from 'react';

/** onError handler: swaps a broken image for the placeholder, once */
export const fallbackTo = (placeholder: string) => (event: SyntheticEvent<HTMLImageElement>) => {
  const image = event.currentTarget;
  if (image.getAttribute('src') !== placeholder) {
    image.setAttribute('src', placeholder);
  }
};
