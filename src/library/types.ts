/**
 * Project Library — Types
 */

export interface Project {
  /** Directory base name, unique within a library */
  readonly name: string;
  /** `join(basePath, name)` */
  readonly path: string;
}

export interface LibraryOptions {
  /** List entries whose names start with `.` */
  displayHidden?: boolean;
  /** Apply Windows device-name rules when validating new names */
  windowsCompat?: boolean;
}

export interface CloneOptions {
  remote: string;
  /** Target directory name; git derives one from the remote when omitted */
  name?: string;
  branch?: string;
  quiet?: boolean;
}
