/**
 * Shortcut file renderers, one per ShortcutFormat.
 */

export interface ShortcutContent {
  name: string;
  description: string;
  targetPath: string;
  args: readonly string[];
  workingDir: string;
  /** Only set when the icon file exists */
  iconPath?: string;
}

/**
 * Quote an argument for an Exec key of a freedesktop entry
 */
function quoteExecArg(arg: string): string {
  const escapedPercent = arg.replace(/%/g, '%%');
  if (!/[\s"'\\$`<>|&;()*?#~]/.test(arg) && arg.length > 0) {
    return escapedPercent;
  }
  return `"${escapedPercent.replace(/(["`$\\])/g, '\\$1')}"`;
}

/**
 * freedesktop.org desktop entry (Linux)
 */
export function renderDesktopEntry(content: ShortcutContent): string {
  const exec = [content.targetPath, ...content.args].map(quoteExecArg).join(' ');
  const lines = [
    '[Desktop Entry]',
    'Type=Application',
    'Version=1.0',
    `Name=${content.name}`,
    `Comment=${content.description}`,
    `Exec=${exec}`,
    `Path=${content.workingDir}`,
    'Terminal=false'
  ];
  if (content.iconPath) {
    lines.push(`Icon=${content.iconPath}`);
  }
  return lines.join('\n') + '\n';
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Double-clickable shell script (macOS Finder runs .command files)
 */
export function renderCommandScript(content: ShortcutContent): string {
  const command = [content.targetPath, ...content.args].map(shellQuote).join(' ');
  return [
    '#!/bin/sh',
    `# ${content.description}`,
    `cd ${shellQuote(content.workingDir)} && exec ${command}`,
    ''
  ].join('\n');
}

function powershellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Join arguments into one Windows command line (CommandLineToArgvW rules)
 */
export function windowsCommandLine(args: readonly string[]): string {
  return args
    .map(arg => {
      if (arg.length > 0 && !/[\s"]/.test(arg)) return arg;
      const escaped = arg
        .replace(/(\\*)"/g, '$1$1\\"')
        .replace(/(\\+)$/, '$1$1');
      return `"${escaped}"`;
    })
    .join(' ');
}

/**
 * PowerShell script that writes a .lnk through the WScript.Shell COM object.
 * Without an icon the link uses the target's own icon.
 */
export function renderLnkScript(content: ShortcutContent, linkPath: string): string {
  return [
    '$ErrorActionPreference = "Stop"',
    '$shell = New-Object -ComObject WScript.Shell',
    `$link = $shell.CreateShortcut(${powershellString(linkPath)})`,
    `$link.TargetPath = ${powershellString(content.targetPath)}`,
    `$link.Arguments = ${powershellString(windowsCommandLine(content.args))}`,
    `$link.WorkingDirectory = ${powershellString(content.workingDir)}`,
    // 7: minimized
    '$link.WindowStyle = 7',
    `$link.IconLocation = ${powershellString(content.iconPath ?? content.targetPath)}`,
    `$link.Description = ${powershellString(content.description)}`,
    '$link.Save()'
  ].join('\n');
}

/**
 * Argument for powershell.exe -EncodedCommand
 */
export function encodePowerShell(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}
