/**
 * Dockerfile.template rendering.
 *
 * Templates are Jinja-style (rendered with nunjucks). They see every
 * configuration key under its on-disk name (`seed_image`, `apt_options`...)
 * and can use these filters:
 *
 *   {{ "foo" | image_tag }}      full label of a known image, e.g. registry/foo:1.0
 *   {{ "www-data" | uid }}       numeric uid from known_uid_mappings
 *   {{ "app" | add_user }}       groupadd/useradd commands for a mapped user
 *   {{ "curl git" | apt_install }}
 *   {{ "curl" | apt_remove }}
 */

import nunjucks from "nunjucks";
import type { Environment } from "nunjucks";

import { templateContext, type ImageTreeConfig } from "./config.js";
import { ImageTreeError } from "./errors.js";
import { ImageLabel } from "./label.js";
import { log } from "./logger.js";

const APT_INSTALL_TEMPLATE = [
  "{%- if apt_only_proxy -%}",
  "echo 'Acquire::http::Proxy \"{{ apt_only_proxy }}\";' > /etc/apt/apt.conf.d/80_proxy \\",
  "    && apt-get update {{ apt_options }} \\",
  "{%- else -%}",
  "apt-get update {{ apt_options }} \\",
  "{%- endif %}",
  "    && DEBIAN_FRONTEND=noninteractive \\",
  "    apt-get install {{ apt_options }} --yes {{ packages }} --no-install-recommends \\",
  "{%- if apt_only_proxy %}",
  "    && rm -f /etc/apt/apt.conf.d/80_proxy \\",
  "{%- endif %}",
  "    && apt-get clean && rm -rf /var/lib/apt/lists/* ",
].join("\n");

const APT_REMOVE_TEMPLATE = [
  "{%- if apt_only_proxy -%}",
  "echo 'Acquire::http::Proxy \"{{ apt_only_proxy }}\";' > /etc/apt/apt.conf.d/80_proxy  && \\",
  "{%- endif -%}",
  "    apt-get update && DEBIAN_FRONTEND=noninteractive apt-get remove --yes --purge {{ packages }} \\",
  "{%- if apt_only_proxy %}",
  "    && rm -f /etc/apt/apt.conf.d/80_proxy \\",
  "{%- endif %}",
  "    && apt-get clean && rm -rf /var/lib/apt/lists/* ",
].join("\n");

/** Environment for the built-in snippets; no loader, no escaping. */
const snippets = new nunjucks.Environment(null, { autoescape: false });

/**
 * True when the Dockerfile runs as a numeric user: the last `USER`
 * instruction is `USER <uid>` or `USER <uid>:<gid>`. A Dockerfile without
 * `USER` counts as numeric.
 */
export function hasNumericUser(dockerfile: string): boolean {
  let numeric = true;
  for (const line of dockerfile.split("\n")) {
    if (line.startsWith("USER ")) {
      numeric = /^USER\s+\d+(?::\d+)?$/.test(line);
    }
  }
  return numeric;
}

export class TemplateEngine {
  private readonly env: Environment;
  private readonly config: ImageTreeConfig;
  private readonly knownImages: ReadonlySet<string>;

  /**
   * @param directory - Directory templates are loaded from.
   * @param knownImages - Full labels `image_tag` can resolve; read at render time.
   */
  constructor(directory: string, config: ImageTreeConfig, knownImages: ReadonlySet<string>) {
    this.config = config;
    this.knownImages = knownImages;
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(directory, { noCache: true }), {
      autoescape: false,
    });
    this.env.addFilter("image_tag", (name: string) => this.imageTag(name));
    this.env.addFilter("uid", (user: string) => this.uid(user));
    this.env.addFilter("add_user", (user: string) => this.addUser(user));
    this.env.addFilter("apt_install", (packages: string) => this.aptInstall(packages));
    this.env.addFilter("apt_remove", (packages: string) => this.aptRemove(packages));
  }

  /** Render the named template file with the configuration as context. */
  render(name: string): string {
    return this.env.render(name, templateContext(this.config));
  }

  imageTag(imageName: string): string {
    const wanted = ImageLabel.fromConfig(this.config, imageName, "").name;
    for (const known of this.knownImages) {
      const separator = known.lastIndexOf(":");
      const name = separator === -1 ? known : known.slice(0, separator);
      if (name === wanted) {
        return known;
      }
    }
    throw new ImageTreeError(`Image ${wanted} not found`);
  }

  /**
   * Mapped uid, or the user name itself when there is no mapping. With
   * force_numeric_user the resulting Dockerfile is rejected at build time.
   */
  uid(user: string): string {
    const mapped = this.config.knownUidMappings[user];
    if (mapped === undefined) {
      log.warn(`UID mapping for user ${user} not found`);
      return user;
    }
    return String(mapped);
  }

  addUser(user: string): string {
    const id = this.uid(user);
    if (id === user) {
      throw new ImageTreeError(`No mapping found for user '${user}'`);
    }
    const groupadd = `groupadd -o -g ${id} -r ${user}`;
    const useradd = `useradd -l -o -r -m -d /var/lib/${user} -g ${user} -u ${id} ${user}`;
    return `${groupadd} && ${useradd}`;
  }

  aptInstall(packages: string): string {
    // Newline-separated package lists become space-separated ones
    return snippets.renderString(APT_INSTALL_TEMPLATE, {
      ...templateContext(this.config),
      packages: packages.replace(/\n/g, " "),
    });
  }

  aptRemove(packages: string): string {
    return snippets.renderString(APT_REMOVE_TEMPLATE, { ...templateContext(this.config), packages });
  }
}
