export interface ScaffoldOptions {
  /** Run venv creation and pip install after writing (commander --no-install sets false) */
  install: boolean;
  verbose: boolean;
}

export interface InitOptions extends ScaffoldOptions {
  quick?: boolean;
}

export interface CreateOptions extends ScaffoldOptions {
  db?: string;
  auth?: string;
  features?: string;
}
