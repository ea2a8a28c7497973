export interface PricePoint {
  instrumentId: string;
  date: string;
  price: number;
}
