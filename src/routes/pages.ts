import { HomeContent } from "../content/home";
import { HttpResult, html } from "../http";
import { TemplateRenderer } from "../render/templates";

export function handleHome(
  renderer: TemplateRenderer,
  content: HomeContent
): HttpResult {
  return html(
    renderer.render("home", { ...content, year: new Date().getFullYear() })
  );
}

export function handleAbout(renderer: TemplateRenderer): HttpResult {
  return html(renderer.render("about"));
}
