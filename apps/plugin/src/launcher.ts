/**
 * Services the host launcher provides to the plugin. Implemented by the host
 * adapter; every call is fire-and-forget from the plugin's point of view.
 */
export interface LauncherApi {
  openUrl(url: string): Promise<void>;
  openSettingsMenu(): Promise<void>;
  showMessage(title: string, subTitle: string, icon?: string): Promise<void>;
  copyToClipboard(text: string): Promise<void>;
  // Opens the file manager with the file selected
  revealFile(filePath: string): Promise<void>;
}

export interface ExecuteResult {
  // Whether the launcher window should close after the action
  hide: boolean;
}
