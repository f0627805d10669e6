export type Colorizer = (str: string) => string;

export const optionalChalk = (fn: Colorizer, colored: boolean = false): Colorizer => (colored ? fn : (str: string) => str);
