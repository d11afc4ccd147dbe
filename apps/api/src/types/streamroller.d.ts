declare module 'streamroller' {
  import { Writable } from 'stream';

  export interface RollingFileWriteStreamOptions {
    maxSize?: number;        // байты; 0 — без ротации по размеру
    numToKeep?: number;
    pattern?: string;        // дата в имени файла, напр. 'yyyy-MM-dd'
    compress?: boolean;
    keepFileExt?: boolean;
  }

  export class RollingFileWriteStream extends Writable {
    constructor(filePath: string, options?: RollingFileWriteStreamOptions);
  }
}
