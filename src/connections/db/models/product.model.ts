// Product Model - catalogue entry referenced by order details through sku

export interface Product {
  id: number;
  sku: string; // unique
  name: string;
  image: string | null;
  variant: string | null;
  location: string | null;
  barcode: string | null;
  created_at: Date;
  updated_at: Date;
}
