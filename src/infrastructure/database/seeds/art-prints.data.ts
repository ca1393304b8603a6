/**
 * Sample catalog inserted when the `artprint` collection is empty.
 */
export interface ArtPrintSeedData {
  title: string;
  artist: string;
  description: string;
  price: number;
  size: string;
  imageUrl: string;
  tags: string[];
  inStock: boolean;
  featured: boolean;
}

export const ART_PRINTS_SEED_DATA: ArtPrintSeedData[] = [
  {
    title: 'Sunlit Dunes',
    artist: 'Ava Linden',
    description: 'Soft gradients inspired by desert horizons.',
    price: 49,
    size: '12x18 in',
    imageUrl:
      'https://images.unsplash.com/photo-1500530855697-b586d89ba3ee?q=80&w=1200&auto=format&fit=crop',
    tags: ['abstract', 'minimal'],
    inStock: true,
    featured: true,
  },
  {
    title: 'Coastal Mist',
    artist: 'Noah Pierce',
    description: 'Calming blue tones of a foggy shoreline.',
    price: 59,
    size: '16x20 in',
    imageUrl:
      'https://images.unsplash.com/photo-1501785888041-af3ef285b470?q=80&w=1200&auto=format&fit=crop',
    tags: ['landscape', 'blue'],
    inStock: true,
    featured: true,
  },
  {
    title: 'City Geometry',
    artist: 'Mila Ortega',
    description: 'Architectural lines and morning light.',
    price: 45,
    size: '12x16 in',
    imageUrl:
      'https://images.unsplash.com/photo-1491553895911-0055eca6402d?q=80&w=1200&auto=format&fit=crop',
    tags: ['architecture', 'black-white'],
    inStock: true,
    featured: false,
  },
  {
    title: 'Botanical Study',
    artist: 'Elle Fuji',
    description: 'Delicate leaves with watercolor textures.',
    price: 39,
    size: '11x14 in',
    imageUrl:
      'https://images.unsplash.com/photo-1499951360447-b19be8fe80f5?q=80&w=1200&auto=format&fit=crop',
    tags: ['botanical', 'nature'],
    inStock: true,
    featured: false,
  },
];
