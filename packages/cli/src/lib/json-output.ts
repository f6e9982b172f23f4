export interface JsonSuccess<T> {
  success: true;
  data: T;
}

export interface JsonError {
  success: false;
  error: {
    code: number;
    message: string;
  };
}

export function outputSuccess<T>(data: T): void {
  const response: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(response, null, 2));
}

export function outputError(code: number, message: string): never {
  const response: JsonError = { success: false, error: { code, message } };
  console.log(JSON.stringify(response, null, 2));
  process.exit(code);
}
