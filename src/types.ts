export interface ProductRecord {
  /** PrestaShop product id, also the name of its FTP image directory. */
  id: string;
  images: number;
  stock: number;
  folder: string;
}

export interface RemoteImageSet {
  mainImage: string | null;
  additionalImages: string[];
}

export interface ReportSummary {
  total_products: number;
  total_images: number;
  total_stock: number;
  successful_migrations?: number;
  failed_migrations?: number;
}

export interface MigrationReport {
  timestamp: string;
  products: Record<string, ProductRecord>;
  summary: ReportSummary;
}

export interface MigrationCounts {
  successful: number;
  failed: number;
}

export interface StagedImage {
  path: string;
  index: number;
}

export interface WooImage {
  id: number;
  src?: string;
  name?: string;
}

export interface WooProduct {
  id: number;
  name: string;
  stock_quantity?: number | null;
  images?: WooImage[];
}

export interface WooMedia {
  id: number;
  title?: { rendered?: string };
}

/** Decides whether the upload phase runs, after the extraction report is written. */
export type ConfirmUpload = (report: MigrationReport, reportPath: string) => Promise<boolean>;
