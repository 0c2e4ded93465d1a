// 路径配置：配置文件位置与相对路径解析

import { isAbsolute, join } from "node:path";


/** 默认配置文件：cwd 下的 site.config.json，可用 SITE_CONFIG 指向别处 */
export function siteConfigPath(): string {
  return resolveFromCwd(process.env.SITE_CONFIG ?? "site.config.json");
}


/** 相对路径按 cwd 解析，绝对路径原样返回 */
export function resolveFromCwd(p: string): string {
  return isAbsolute(p) ? p : join(process.cwd(), p);
}
