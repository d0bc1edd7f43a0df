import { v4 as uuidv4 } from 'uuid';

export interface ResponseMetadata {
  timestamp: string;
  version: string;
  requestId: string;
  responseTime?: number;
}

export interface BaseResponseDTO<T> {
  data: T;
  meta: ResponseMetadata;
}

export abstract class BaseView<T, R> {
  protected readonly apiVersion = '1.0.0';

  abstract format(data: T): R;

  formatSingle(data: T, startTime?: number): BaseResponseDTO<R> {
    return this.formatResponse(this.format(data), startTime);
  }

  formatList(items: T[], startTime?: number): BaseResponseDTO<R[]> {
    return this.formatResponse(
      items.map((item) => this.format(item)),
      startTime
    );
  }

  protected createMetadata(startTime?: number): ResponseMetadata {
    const metadata: ResponseMetadata = {
      timestamp: new Date().toISOString(),
      version: this.apiVersion,
      requestId: uuidv4(),
    };

    if (startTime) {
      metadata.responseTime = Date.now() - startTime;
    }

    return metadata;
  }

  protected formatResponse<D>(data: D, startTime?: number): BaseResponseDTO<D> {
    return {
      data,
      meta: this.createMetadata(startTime),
    };
  }
}
