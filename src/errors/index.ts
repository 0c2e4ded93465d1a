// 管线错误：CLI 入口捕获后决定退出码


/** 必需的输入文件不存在（bib 源文件等），致命 */
export class InputNotFoundError extends Error {
  readonly path: string;

  constructor(path: string, message = `输入文件不存在: ${path}`) {
    super(message);
    this.name = "InputNotFoundError";
    this.path = path;
  }
}


/** HTTP 拉取失败：非 2xx、超时或网络错误 */
export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}


/** 配置文件无法解析或校验失败 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
